import * as cron from 'node-cron';
import { ApplicationConfig } from '../interfaces/ApplicationConfig';
import { LogLevel } from '../interfaces/Logger';
import { BackupConfiguration } from '../backup/BackupConfiguration';
import { Folder, parseFolder } from '../types/Folder';
import { EnvironmentConfig } from '../types/EnvironmentConfig';

export class ConfigurationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const REQUIRED_VARS: readonly (keyof EnvironmentConfig)[] = [
  'MINECRAFT_PATH',
  'BACKUP_DESTINATION',
  'BACKUP_FOLDERS',
];

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): ApplicationConfig {
    const missingVars = REQUIRED_VARS.filter(name => !env[name]?.trim());
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const config: ApplicationConfig = {
      minecraftPath: (env['MINECRAFT_PATH'] ?? '').trim(),
      destination: (env['BACKUP_DESTINATION'] ?? '').trim(),
      folders: this.parseFolders(env['BACKUP_FOLDERS'] ?? ''),
      compress: this.parseBoolean(env['BACKUP_COMPRESS'], 'BACKUP_COMPRESS', false),
      excludedExtensions: this.parseList(env['BACKUP_EXCLUDED_EXTENSIONS'] ?? ''),
      logLevel: this.parseLogLevel(env['LOG_LEVEL']),
    };

    const backupInterval = env['BACKUP_INTERVAL']?.trim();
    if (backupInterval) {
      if (!cron.validate(backupInterval)) {
        throw new ConfigurationError(
          'BACKUP_INTERVAL must be a valid cron expression',
          'BACKUP_INTERVAL'
        );
      }
      config.backupInterval = backupInterval;
    }

    return config;
  }

  /**
   * Build the backup configuration a run operates on
   */
  static toBackupConfiguration(config: ApplicationConfig): BackupConfiguration {
    return new BackupConfiguration(
      config.minecraftPath,
      config.folders,
      config.destination,
      config.compress,
      config.excludedExtensions
    );
  }

  static describeForLogging(config: ApplicationConfig): Record<string, unknown> {
    return {
      minecraftPath: config.minecraftPath,
      destination: config.destination,
      folders: config.folders.join(','),
      compress: config.compress,
      excludedExtensions: config.excludedExtensions.join(','),
      backupInterval: config.backupInterval ?? 'run once',
      logLevel: config.logLevel,
    };
  }

  private static parseFolders(value: string): Folder[] {
    const names = this.parseList(value);
    if (names.length === 0) {
      throw new ConfigurationError('BACKUP_FOLDERS must name at least one folder', 'BACKUP_FOLDERS');
    }

    const folders: Folder[] = [];
    for (const name of names) {
      const folder = parseFolder(name);
      if (folder === null) {
        throw new ConfigurationError(
          `BACKUP_FOLDERS contains unknown folder: ${name}`,
          'BACKUP_FOLDERS'
        );
      }
      if (!folders.includes(folder)) {
        folders.push(folder);
      }
    }
    return folders;
  }

  private static parseBoolean(
    value: string | undefined,
    field: keyof EnvironmentConfig,
    defaultValue: boolean
  ): boolean {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) {
      return defaultValue;
    }
    if (TRUE_VALUES.includes(normalized)) {
      return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
      return false;
    }
    throw new ConfigurationError(`${field} must be true or false`, field);
  }

  private static parseList(value: string): string[] {
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private static parseLogLevel(value: string | undefined): LogLevel {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) {
      return LogLevel.INFO;
    }
    const level = Object.values(LogLevel).find(candidate => candidate === normalized);
    if (!level) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return level;
  }
}
