import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { ApplicationConfig } from './interfaces/ApplicationConfig';
import { BackupResult } from './interfaces/BackupManager';

export { BackupConfiguration } from './backup/BackupConfiguration';
export type { BackupConfigurationOptions, CollectedFile } from './backup/BackupConfiguration';
export { BackupRecord, METADATA_ENTRY_NAME } from './backup/BackupRecord';
export { BackupManager, resolveArchivePath } from './clients/BackupManager';
export { Folder, ALL_FOLDERS, folderPath, parseFolder } from './types/Folder';
export {
  BackupError,
  IOError,
  SerializationError,
  InvalidConfigurationError,
} from './errors/BackupErrors';

/**
 * Main application class that loads configuration and runs or schedules backups
 */
class MinecraftBackupApplication {
  private logger: Logger;
  private config: ApplicationConfig | null = null;
  private backupManager: BackupManager | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;

  constructor(logger: Logger = Logger.createFromEnvironment()) {
    this.logger = logger;
  }

  /**
   * Load configuration and build the backup components
   * @returns false when the configuration is unusable
   */
  async initialize(env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
    this.logger.info('Minecraft backup service starting...');

    let config: ApplicationConfig;
    try {
      config = ConfigurationManager.loadConfiguration(env);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration error', error, { field: error.field });
        return false;
      }
      throw error;
    }

    this.config = config;
    this.logger = new Logger(config.logLevel);
    this.logger.logConfigurationStart(ConfigurationManager.describeForLogging(config));

    const backupManager = new BackupManager(
      ConfigurationManager.toBackupConfiguration(config),
      this.logger
    );

    if (!(await backupManager.validateConfiguration())) {
      this.logger.error('Configuration validation failed');
      return false;
    }
    this.backupManager = backupManager;

    if (config.backupInterval) {
      this.cronScheduler = new CronScheduler(
        {
          cronExpression: config.backupInterval,
          timezone: 'UTC',
          runOnInit: false,
        },
        backupManager,
        this.logger
      );
    }

    this.logger.info('Application initialized successfully');
    return true;
  }

  isScheduled(): boolean {
    return this.cronScheduler !== null;
  }

  /**
   * Run a single backup with the loaded configuration
   */
  async runOnce(): Promise<BackupResult> {
    if (!this.backupManager) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.backupManager.executeBackup();
  }

  /**
   * Start scheduled backups
   */
  start(): void {
    if (!this.cronScheduler || !this.config) {
      throw new Error('No backup schedule configured. Set BACKUP_INTERVAL to enable scheduling.');
    }

    this.logger.info(`Starting backup scheduler with interval: ${this.config.backupInterval}`);
    this.cronScheduler.start();
    this.logger.info('Service is now running and will execute backups according to the configured schedule');
  }

  shutdown(): void {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }

    this.logger.info('Minecraft backup service shutdown completed');
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown();
        process.exit(0);
      });
    });

    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception', error);
      this.shutdown();
      process.exit(5);
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', new Error(String(reason)));
      this.shutdown();
      process.exit(6);
    });
  }
}

/**
 * Main application entry point
 * @returns process exit code, or null when the scheduler keeps the process alive
 */
async function main(): Promise<number | null> {
  const app = new MinecraftBackupApplication();

  if (!(await app.initialize())) {
    return 1;
  }

  if (!app.isScheduled()) {
    const result = await app.runOnce();
    return result.success ? 0 : 1;
  }

  app.setupSignalHandlers();
  app.start();
  return null;
}

// Export for testing
export { MinecraftBackupApplication, main };

if (require.main === module) {
  main()
    .then(code => {
      if (code !== null) {
        process.exit(code);
      }
    })
    .catch(error => {
      console.error('Fatal error starting application:', error);
      process.exit(7);
    });
}
