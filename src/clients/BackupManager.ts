import { createWriteStream, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import archiver from 'archiver';
import { v4 as uuidv4 } from 'uuid';
import { BackupManager as IBackupManager, BackupResult } from '../interfaces/BackupManager';
import { Logger as ILogger } from '../interfaces/Logger';
import { BackupConfiguration, CollectedFile } from '../backup/BackupConfiguration';
import { BackupRecord, METADATA_ENTRY_NAME } from '../backup/BackupRecord';
import {
  BackupError,
  InvalidConfigurationError,
  asError,
  formatError,
  toError,
  toIOError,
} from '../errors/BackupErrors';
import { Logger } from './Logger';

export interface BackupManagerOptions {
  /** zlib level used for ZIP entries (0-9) */
  compressionLevel?: number;
}

const DEFAULT_COMPRESSION_LEVEL = 9;

/**
 * Archive path for a compressed backup: the destination itself when it already ends in .zip
 */
export function resolveArchivePath(destination: string): string {
  const resolved = path.resolve(destination);
  return resolved.toLowerCase().endsWith('.zip') ? resolved : `${resolved}.zip`;
}

/**
 * BackupManager implementation that copies or archives the selected Minecraft folders
 */
export class BackupManager implements IBackupManager {
  private configuration: BackupConfiguration;
  private logger: ILogger;
  private compressionLevel: number;

  constructor(
    configuration: BackupConfiguration,
    logger: ILogger = new Logger(),
    options: BackupManagerOptions = {}
  ) {
    this.configuration = configuration;
    this.logger = logger;
    this.compressionLevel = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;

    if (
      !Number.isInteger(this.compressionLevel) ||
      this.compressionLevel < 0 ||
      this.compressionLevel > 9
    ) {
      throw new InvalidConfigurationError(
        `Compression level must be an integer between 0 and 9, got ${this.compressionLevel}`,
        'compressionLevel'
      );
    }
  }

  /**
   * Run the bound configuration: ZIP archive when compress is set, mirrored copy plus sidecar metadata otherwise
   */
  async executeBackup(): Promise<BackupResult> {
    const startTime = Date.now();
    const operationId = this.generateOperationId();
    const configuration = this.configuration;

    this.logger.logBackupStart(configuration.sourceRoot, {
      operationId,
      mode: configuration.compress ? 'zip' : 'plain',
      folders: configuration.folders.join(','),
    });

    try {
      let destination: string;
      let metadataPath: string;
      let record: BackupRecord;

      if (configuration.compress) {
        record = await this.zipBackup(configuration);
        destination = resolveArchivePath(configuration.destination);
        metadataPath = METADATA_ENTRY_NAME;
      } else {
        record = await this.plainCopy(configuration);
        destination = path.resolve(configuration.destination);
        metadataPath = await record.writeJSON();
        this.logger.debug('Metadata written', { operationId, metadataPath });
      }

      const duration = Date.now() - startTime;
      this.logger.logBackupComplete(destination, record.sizeInBytes, record.fileCount, duration);

      return {
        success: true,
        destination,
        sizeInBytes: record.sizeInBytes,
        fileCount: record.fileCount,
        metadataPath,
        duration,
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      const cause = toError(error);
      this.logger.logBackupError(
        error instanceof BackupError ? error.operation : 'backup',
        cause,
        { operationId, duration }
      );

      return {
        success: false,
        destination: '',
        sizeInBytes: 0,
        fileCount: 0,
        metadataPath: '',
        duration,
        error: formatError(error),
      };
    }
  }

  /**
   * Validate the bound configuration: source root must be a directory and differ from the destination
   */
  async validateConfiguration(): Promise<boolean> {
    try {
      this.assertValid(this.configuration);
    } catch (error) {
      this.logger.error('Invalid backup configuration', asError(error));
      return false;
    }

    const sourceRoot = path.resolve(this.configuration.sourceRoot);
    try {
      const stats = await fs.stat(sourceRoot);
      if (!stats.isDirectory()) {
        this.logger.error('Minecraft path is not a directory', undefined, { sourceRoot });
        return false;
      }
    } catch (error) {
      this.logger.error(
        'Minecraft path is not accessible',
        asError(error),
        { sourceRoot }
      );
      return false;
    }

    const existing: string[] = [];
    for (const folderRoot of this.configuration.getAllPaths()) {
      const found = await fs.stat(folderRoot).then(
        stats => stats.isDirectory(),
        () => false
      );
      if (found) {
        existing.push(folderRoot);
      }
    }

    if (existing.length === 0) {
      this.logger.warn('None of the selected folders exist, backups will be empty', {
        sourceRoot,
        folders: this.configuration.folders.join(','),
      });
    }

    this.logger.info('Backup configuration validated', {
      sourceRoot,
      existingFolders: existing.length,
    });
    return true;
  }

  /**
   * Copy every selected file into destination/<relative path>.
   * Files are written to a temporary sibling and renamed into place; a failure
   * leaves the files already copied on disk.
   */
  async plainCopy(configuration: BackupConfiguration): Promise<BackupRecord> {
    this.assertValid(configuration);

    const files = await configuration.collectFiles();
    const destinationRoot = path.resolve(configuration.destination);

    try {
      await fs.mkdir(destinationRoot, { recursive: true });
    } catch (error) {
      throw toIOError(error, 'create directory', destinationRoot);
    }

    for (const file of files) {
      await this.copyFile(file, destinationRoot);
    }

    const record = new BackupRecord(configuration, totalSize(files), files.length);
    this.logger.info('Plain copy finished', {
      destination: destinationRoot,
      fileCount: record.fileCount,
      sizeInBytes: record.sizeInBytes,
    });
    return record;
  }

  /**
   * Write every selected file plus backup_metadata.json into one ZIP archive
   */
  async zipBackup(configuration: BackupConfiguration): Promise<BackupRecord> {
    this.assertValid(configuration);

    const files = await configuration.collectFiles();
    const record = new BackupRecord(configuration, totalSize(files), files.length);
    const archivePath = resolveArchivePath(configuration.destination);
    const tempArchivePath = `${archivePath}.${uuidv4()}.tmp`;

    let stagingDir: string | null = null;
    try {
      await fs.mkdir(path.dirname(archivePath), { recursive: true });
      stagingDir = await fs.mkdtemp(path.join(os.tmpdir(), 'minecraft-backup-'));

      const metadataPath = await record.writeJSON(path.join(stagingDir, METADATA_ENTRY_NAME));
      await this.writeArchive(tempArchivePath, files, metadataPath);
      await fs.rename(tempArchivePath, archivePath);
    } catch (error) {
      await this.removeQuietly(tempArchivePath);
      if (error instanceof BackupError) {
        throw error;
      }
      throw toIOError(error, 'create archive', archivePath);
    } finally {
      if (stagingDir) {
        await this.removeQuietly(stagingDir);
      }
    }

    this.logger.info('Archive created', {
      archivePath,
      fileCount: record.fileCount,
      sizeInBytes: record.sizeInBytes,
      metadataSizeInBytes: record.jsonSizeInBytes,
    });
    return record;
  }

  private assertValid(configuration: BackupConfiguration): void {
    const sourceRoot = path.resolve(configuration.sourceRoot);
    const destination = path.resolve(configuration.destination);

    if (sourceRoot === destination) {
      throw new InvalidConfigurationError(
        `Source and destination must differ: ${sourceRoot}`,
        'destination'
      );
    }
  }

  private async copyFile(file: CollectedFile, destinationRoot: string): Promise<void> {
    const targetPath = path.join(destinationRoot, ...file.relativePath.split('/'));
    const tempPath = `${targetPath}.${uuidv4()}.tmp`;

    try {
      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.copyFile(file.absolutePath, tempPath);
      await fs.rename(tempPath, targetPath);
      this.logger.debug('Copied file', { relativePath: file.relativePath, size: file.size });
    } catch (error) {
      await this.removeQuietly(tempPath);
      throw toIOError(error, 'copy', file.absolutePath);
    }
  }

  private writeArchive(
    archivePath: string,
    files: CollectedFile[],
    metadataPath: string
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const output = createWriteStream(archivePath);
      const archive = archiver('zip', { zlib: { level: this.compressionLevel } });
      let failed = false;

      const fail = (error: Error): void => {
        if (failed) {
          return;
        }
        failed = true;
        archive.abort();
        output.destroy();
        reject(error);
      };

      output.on('close', () => {
        if (!failed) {
          resolve();
        }
      });
      output.on('error', fail);
      archive.on('error', fail);
      // archiver reports unreadable or vanished files as warnings
      archive.on('warning', fail);

      archive.pipe(output);
      for (const file of files) {
        archive.file(file.absolutePath, { name: file.relativePath });
      }
      archive.file(metadataPath, { name: METADATA_ENTRY_NAME });
      archive.finalize().catch(fail);
    });
  }

  private async removeQuietly(target: string): Promise<void> {
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('Failed to remove temporary path', { target, error: formatError(error) });
    }
  }

  /**
   * Generate unique operation ID for tracking
   */
  private generateOperationId(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const random = Math.random().toString(36).substring(2, 8);
    return `backup-${timestamp}-${random}`;
  }
}

function totalSize(files: CollectedFile[]): number {
  return files.reduce((total, file) => total + file.size, 0);
}
