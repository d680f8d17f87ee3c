import { promises as fs } from 'fs';
import * as path from 'path';
import { BackupConfiguration } from './BackupConfiguration';
import { BackupMetadata, BackupMetadataJson } from '../types/BackupMetadata';
import { Folder, folderPath, parseFolder } from '../types/Folder';
import { SerializationError, asError, formatError, toIOError } from '../errors/BackupErrors';

/** Entry name of the metadata document inside a ZIP backup */
export const METADATA_ENTRY_NAME = 'backup_metadata.json';

/**
 * Metadata about a single backup run
 */
export class BackupRecord {
  readonly configuration: BackupConfiguration;
  readonly sizeInBytes: number;
  readonly fileCount: number;
  readonly timestamp: Date;
  private writtenSize = 0;

  constructor(
    configuration: BackupConfiguration,
    sizeInBytes: number,
    fileCount: number = 0,
    timestamp: Date = new Date()
  ) {
    this.configuration = configuration;
    this.sizeInBytes = sizeInBytes;
    this.fileCount = fileCount;
    this.timestamp = timestamp;
  }

  /**
   * Size of the last JSON document written by writeJSON, 0 until then
   */
  get jsonSizeInBytes(): number {
    return this.writtenSize;
  }

  toJSON(): BackupMetadataJson {
    return {
      timestamp: this.timestamp.toISOString(),
      size_in_bytes: this.sizeInBytes,
      file_count: this.fileCount,
      source_root: this.configuration.sourceRoot,
      destination: this.configuration.destination,
      folders: this.configuration.folders.map(folderPath),
      compress: this.configuration.compress,
      excluded_extensions: [...this.configuration.excludedExtensions],
    };
  }

  serialize(): string {
    try {
      return JSON.stringify(this.toJSON(), null, 2);
    } catch (error) {
      throw new SerializationError(
        `Failed to serialize backup metadata: ${formatError(error)}`,
        asError(error)
      );
    }
  }

  /**
   * Sidecar path next to the destination, e.g. /backups/world_2024-01-15T14-30-45-000Z_backup_metadata.json
   */
  defaultMetadataPath(): string {
    const destination = path.resolve(this.configuration.destination);
    const stamp = this.timestamp.toISOString().replace(/[:.]/g, '-');
    return path.join(
      path.dirname(destination),
      `${path.basename(destination)}_${stamp}_backup_metadata.json`
    );
  }

  /**
   * Write the metadata document and record its size on disk
   * @returns the path that was written
   */
  async writeJSON(targetPath: string = this.defaultMetadataPath()): Promise<string> {
    const content = this.serialize();

    try {
      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.writeFile(targetPath, content, 'utf8');
      this.writtenSize = (await fs.stat(targetPath)).size;
    } catch (error) {
      throw toIOError(error, 'write metadata', targetPath);
    }

    return targetPath;
  }

  /**
   * Parse a metadata document written by writeJSON
   */
  static parse(json: string): BackupMetadata {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new SerializationError(
        `Invalid backup metadata JSON: ${formatError(error)}`,
        asError(error)
      );
    }

    if (!isRecord(raw)) {
      throw new SerializationError('Backup metadata must be a JSON object');
    }

    const timestamp = new Date(readString(raw, 'timestamp'));
    if (Number.isNaN(timestamp.getTime())) {
      throw new SerializationError(`Invalid backup timestamp: ${String(raw['timestamp'])}`);
    }

    return {
      timestamp,
      sizeInBytes: readInteger(raw, 'size_in_bytes'),
      fileCount: readInteger(raw, 'file_count'),
      sourceRoot: readString(raw, 'source_root'),
      destination: readString(raw, 'destination'),
      folders: readStringArray(raw, 'folders').map(toFolder),
      compress: readBoolean(raw, 'compress'),
      excludedExtensions: readStringArray(raw, 'excluded_extensions'),
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  if (typeof value !== 'string') {
    throw new SerializationError(`Backup metadata field "${key}" must be a string`);
  }
  return value;
}

function readInteger(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new SerializationError(`Backup metadata field "${key}" must be a non-negative integer`);
  }
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean {
  const value = raw[key];
  if (typeof value !== 'boolean') {
    throw new SerializationError(`Backup metadata field "${key}" must be a boolean`);
  }
  return value;
}

function readStringArray(raw: Record<string, unknown>, key: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new SerializationError(`Backup metadata field "${key}" must be an array of strings`);
  }
  return value;
}

function toFolder(name: string): Folder {
  const folder = parseFolder(name);
  if (folder === null) {
    throw new SerializationError(`Unknown folder in backup metadata: ${name}`);
  }
  return folder;
}
