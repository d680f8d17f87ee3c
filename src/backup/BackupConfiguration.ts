import { Dirent, promises as fs } from 'fs';
import * as path from 'path';
import { Folder, folderPath } from '../types/Folder';
import { hasErrorCode, toIOError } from '../errors/BackupErrors';

/**
 * A file selected for backup
 */
export interface CollectedFile {
  /** Absolute path of the file on disk */
  absolutePath: string;

  /** Path relative to the source root, always using forward slashes */
  relativePath: string;

  /** Size of the file in bytes at the time it was enumerated */
  size: number;
}

export interface BackupConfigurationOptions {
  sourceRoot: string;
  folders: readonly Folder[];
  destination: string;
  compress: boolean;
  excludedExtensions?: readonly string[];
}

/**
 * Immutable description of what to back up and where to put it.
 * Nothing is checked on disk until files are enumerated.
 */
export class BackupConfiguration {
  readonly sourceRoot: string;
  readonly folders: readonly Folder[];
  readonly destination: string;
  readonly compress: boolean;
  readonly excludedExtensions: readonly string[];

  constructor(
    sourceRoot: string,
    folders: readonly Folder[],
    destination: string,
    compress: boolean,
    excludedExtensions: readonly string[] = []
  ) {
    this.sourceRoot = sourceRoot;
    this.folders = Object.freeze([...new Set(folders)]);
    this.destination = destination;
    this.compress = compress;
    this.excludedExtensions = Object.freeze([
      ...new Set(excludedExtensions.map(normalizeExtension).filter(ext => ext.length > 0)),
    ]);
  }

  static fromOptions(options: BackupConfigurationOptions): BackupConfiguration {
    return new BackupConfiguration(
      options.sourceRoot,
      options.folders,
      options.destination,
      options.compress,
      options.excludedExtensions
    );
  }

  /**
   * Create a copy with some fields replaced
   */
  clone(overrides: Partial<BackupConfigurationOptions> = {}): BackupConfiguration {
    return BackupConfiguration.fromOptions({ ...this.toOptions(), ...overrides });
  }

  toOptions(): BackupConfigurationOptions {
    return {
      sourceRoot: this.sourceRoot,
      folders: this.folders,
      destination: this.destination,
      compress: this.compress,
      excludedExtensions: this.excludedExtensions,
    };
  }

  /**
   * Absolute paths of the selected folders, in selection order
   */
  getAllPaths(): string[] {
    const root = path.resolve(this.sourceRoot);
    return this.folders.map(folder => path.join(root, folderPath(folder)));
  }

  isExcluded(filePath: string): boolean {
    const extension = normalizeExtension(path.extname(filePath));
    return extension.length > 0 && this.excludedExtensions.includes(extension);
  }

  /**
   * Absolute paths of every file under the selected folders, minus excluded extensions
   */
  async listAllFiles(): Promise<string[]> {
    const files = await this.collectFiles();
    return files.map(file => file.absolutePath);
  }

  /**
   * Total size in bytes of the files listAllFiles returns, read from disk on every call
   */
  async computeTotalSize(): Promise<number> {
    const files = await this.collectFiles();
    return files.reduce((total, file) => total + file.size, 0);
  }

  async collectFiles(): Promise<CollectedFile[]> {
    const root = path.resolve(this.sourceRoot);
    const files: CollectedFile[] = [];

    for (const folderRoot of this.getAllPaths()) {
      if (!(await isDirectory(folderRoot))) {
        continue;
      }
      await this.walk(folderRoot, root, files);
    }

    return files;
  }

  private async walk(directory: string, root: string, files: CollectedFile[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw toIOError(error, 'read directory', directory);
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const absolutePath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        await this.walk(absolutePath, root, files);
      } else if (entry.isFile() && !this.isExcluded(entry.name)) {
        let size: number;
        try {
          size = (await fs.stat(absolutePath)).size;
        } catch (error) {
          throw toIOError(error, 'stat', absolutePath);
        }
        files.push({
          absolutePath,
          relativePath: path.relative(root, absolutePath).split(path.sep).join('/'),
          size,
        });
      }
    }
  }
}

/**
 * Lower-case an extension and strip its leading dot (".DAT" -> "dat")
 */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, '').toLowerCase();
}

async function isDirectory(directory: string): Promise<boolean> {
  try {
    return (await fs.stat(directory)).isDirectory();
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return false;
    }
    throw toIOError(error, 'stat', directory);
  }
}
