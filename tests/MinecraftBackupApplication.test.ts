import { promises as fs } from 'fs';
import { join } from 'path';
import { MinecraftBackupApplication } from '../src/index';
import { Logger } from '../src/clients/Logger';
import { createMinecraftFixture, listTree, MinecraftFixture } from './helpers/fixtures';

jest.mock('winston', () => {
  const mockLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  return {
    createLogger: jest.fn(() => mockLogger),
    format: {
      combine: jest.fn(),
      timestamp: jest.fn(),
      errors: jest.fn(),
      printf: jest.fn(),
    },
    transports: {
      Console: jest.fn(),
    },
  };
});

jest.mock('node-cron', () => ({
  schedule: jest.fn(),
  validate: jest.fn(),
}));

import * as cron from 'node-cron';

describe('MinecraftBackupApplication', () => {
  let fixture: MinecraftFixture;
  let app: MinecraftBackupApplication;
  let mockTask: { start: jest.Mock; stop: jest.Mock };

  const envFor = (overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
    MINECRAFT_PATH: fixture.minecraftRoot,
    BACKUP_DESTINATION: join(fixture.baseDir, 'backups', 'minecraft.zip'),
    BACKUP_FOLDERS: 'saves,mods',
    BACKUP_COMPRESS: 'true',
    ...overrides,
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    mockTask = { start: jest.fn(), stop: jest.fn() };
    (cron.schedule as jest.Mock).mockReturnValue(mockTask);
    (cron.validate as jest.Mock).mockReturnValue(true);

    fixture = await createMinecraftFixture();
    app = new MinecraftBackupApplication(new Logger());
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  describe('initialize', () => {
    it('should succeed with a valid environment', async () => {
      expect(await app.initialize(envFor())).toBe(true);
      expect(app.isScheduled()).toBe(false);
    });

    it('should fail on configuration errors', async () => {
      expect(await app.initialize({ BACKUP_FOLDERS: 'saves' })).toBe(false);
    });

    it('should fail when the Minecraft directory does not exist', async () => {
      expect(await app.initialize(envFor({ MINECRAFT_PATH: join(fixture.baseDir, 'missing') }))).toBe(
        false
      );
    });

    it('should prepare a scheduler when an interval is configured', async () => {
      expect(await app.initialize(envFor({ BACKUP_INTERVAL: '0 */6 * * *' }))).toBe(true);
      expect(app.isScheduled()).toBe(true);
    });
  });

  describe('runOnce', () => {
    it('should require initialization', async () => {
      await expect(app.runOnce()).rejects.toThrow(
        'Application not initialized. Call initialize() first.'
      );
    });

    it('should write the configured archive', async () => {
      await app.initialize(envFor());

      const result = await app.runOnce();

      expect(result.success).toBe(true);
      expect(result.sizeInBytes).toBe(300);
      expect(result.fileCount).toBe(2);
      expect(await listTree(join(fixture.baseDir, 'backups'))).toEqual(['minecraft.zip']);
    });

    it('should write a mirrored copy when compression is off', async () => {
      const destination = join(fixture.baseDir, 'mirror');
      await app.initialize(
        envFor({ BACKUP_COMPRESS: 'false', BACKUP_DESTINATION: destination, BACKUP_EXCLUDED_EXTENSIONS: 'jar' })
      );

      const result = await app.runOnce();

      expect(result.success).toBe(true);
      expect(result.sizeInBytes).toBe(100);
      expect(await listTree(destination)).toEqual(['saves/world1.dat']);
      expect((await fs.stat(result.metadataPath)).isFile()).toBe(true);
    });
  });

  describe('start and shutdown', () => {
    it('should refuse to start without a schedule', async () => {
      await app.initialize(envFor());

      expect(() => app.start()).toThrow(
        'No backup schedule configured. Set BACKUP_INTERVAL to enable scheduling.'
      );
    });

    it('should start and stop the scheduler', async () => {
      await app.initialize(envFor({ BACKUP_INTERVAL: '0 */6 * * *' }));

      app.start();
      expect(cron.schedule).toHaveBeenCalledWith('0 */6 * * *', expect.any(Function), {
        scheduled: false,
        timezone: 'UTC',
      });
      expect(mockTask.start).toHaveBeenCalled();

      app.shutdown();
      expect(mockTask.stop).toHaveBeenCalled();
    });
  });
});
