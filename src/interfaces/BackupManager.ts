import { BackupConfiguration } from '../backup/BackupConfiguration';
import { BackupRecord } from '../backup/BackupRecord';

/**
 * Result of a backup operation
 */
export interface BackupResult {
  /** Whether the backup operation was successful */
  success: boolean;

  /** Mirrored directory or archive file that was written */
  destination: string;

  /** Total size of the backed up files in bytes */
  sizeInBytes: number;

  /** Number of files backed up */
  fileCount: number;

  /** Where the metadata document was written (an archive entry path in compressed mode) */
  metadataPath: string;

  /** Duration of the backup operation in milliseconds */
  duration: number;

  /** Error message if the backup failed */
  error?: string;
}

/**
 * Interface for the backup orchestration manager
 */
export interface BackupManager {
  /** Copy the selected files into a mirrored tree at the destination */
  plainCopy(configuration: BackupConfiguration): Promise<BackupRecord>;

  /** Write the selected files and their metadata into one ZIP archive */
  zipBackup(configuration: BackupConfiguration): Promise<BackupRecord>;

  /** Run the backup mode the bound configuration asks for */
  executeBackup(): Promise<BackupResult>;

  /** Validate the bound configuration against the filesystem */
  validateConfiguration(): Promise<boolean>;
}
