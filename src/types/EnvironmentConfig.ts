export interface EnvironmentConfig {
  // Required
  MINECRAFT_PATH: string;
  BACKUP_DESTINATION: string;
  BACKUP_FOLDERS: string;

  // Optional
  BACKUP_COMPRESS?: string;
  BACKUP_EXCLUDED_EXTENSIONS?: string;
  BACKUP_INTERVAL?: string;
  LOG_LEVEL?: string;
}
