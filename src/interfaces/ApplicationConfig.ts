import { LogLevel } from './Logger';
import { Folder } from '../types/Folder';

export interface ApplicationConfig {
  minecraftPath: string;
  destination: string;
  folders: Folder[];
  compress: boolean;
  excludedExtensions: string[];
  backupInterval?: string; // cron format, run once when absent
  logLevel: LogLevel;
}
