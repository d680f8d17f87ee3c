import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { Logger } from '../../src/interfaces/Logger';

/**
 * Temporary Minecraft installation with saves/world1.dat (100 bytes) and mods/modA.jar (200 bytes)
 */
export interface MinecraftFixture {
  baseDir: string;
  minecraftRoot: string;
  worldFile: string;
  modFile: string;
  cleanup(): Promise<void>;
}

export async function createMinecraftFixture(): Promise<MinecraftFixture> {
  const baseDir = await fs.mkdtemp(join(tmpdir(), 'minecraft-backup-test-'));
  const minecraftRoot = join(baseDir, 'minecraft');
  const worldFile = join(minecraftRoot, 'saves', 'world1.dat');
  const modFile = join(minecraftRoot, 'mods', 'modA.jar');

  await writeFixtureFile(worldFile, Buffer.alloc(100, 'w'));
  await writeFixtureFile(modFile, Buffer.alloc(200, 'm'));

  return {
    baseDir,
    minecraftRoot,
    worldFile,
    modFile,
    cleanup: () => fs.rm(baseDir, { recursive: true, force: true }),
  };
}

export async function writeFixtureFile(filePath: string, content: Buffer | string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

/**
 * Relative paths (forward slashes) of every file below a directory, sorted
 */
export async function listTree(root: string, prefix = ''): Promise<string[]> {
  const entries = await fs.readdir(join(root, prefix), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listTree(root, relative)));
    } else {
      files.push(relative);
    }
  }
  return files.sort();
}

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logBackupStart: jest.fn(),
    logBackupComplete: jest.fn(),
    logBackupError: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
  };
}
