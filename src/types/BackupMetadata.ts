import { Folder } from './Folder';

/**
 * Metadata document as written to backup_metadata.json
 */
export interface BackupMetadataJson {
  timestamp: string;
  size_in_bytes: number;
  file_count: number;
  source_root: string;
  destination: string;
  folders: string[];
  compress: boolean;
  excluded_extensions: string[];
}

/**
 * Parsed form of a metadata document
 */
export interface BackupMetadata {
  timestamp: Date;
  sizeInBytes: number;
  fileCount: number;
  sourceRoot: string;
  destination: string;
  folders: Folder[];
  compress: boolean;
  excludedExtensions: string[];
}
