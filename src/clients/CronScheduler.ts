import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager } from '../interfaces/BackupManager';
import { Logger as ILogger } from '../interfaces/Logger';
import { asError, formatError, toError } from '../errors/BackupErrors';
import { Logger } from './Logger';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * CronScheduler implementation using node-cron library
 * Runs the backup on schedule and never lets two runs overlap
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private isBackupRunning = false;
  private logger: ILogger;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: ILogger = new Logger()) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(`Starting cron scheduler with expression: ${this.config.cronExpression}`, {
      timezone,
    });

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => this.runScheduledBackup(),
        {
          scheduled: false, // Don't start immediately
          timezone,
        }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      const startError = new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        asError(error)
      );
      this.logger.error(startError.message, startError);
      throw startError;
    }

    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => this.runScheduledBackup());
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.logger.info('Stopping cron scheduler...');
    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error(
        'Cron expression validation error',
        asError(error),
        { expression }
      );
      return false;
    }
  }

  /**
   * Whether a backup started by this scheduler is still in progress
   */
  isBackupInProgress(): boolean {
    return this.isBackupRunning;
  }

  private runScheduledBackup(): void {
    this.executeScheduledBackup().catch(error => {
      this.logger.error(
        'Unexpected error in scheduled backup execution',
        toError(error)
      );
    });
  }

  /**
   * Execute a scheduled backup, skipping the tick if the previous one is still running
   */
  private async executeScheduledBackup(): Promise<void> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;
    const startTime = Date.now();
    const executionId = this.generateExecutionId();

    try {
      this.logger.logScheduledExecution(this.config.cronExpression);

      const result = await this.backupManager.executeBackup();
      const duration = Date.now() - startTime;

      if (result.success) {
        this.logger.info(`[${executionId}] Scheduled backup completed successfully`, {
          duration,
          destination: result.destination,
          sizeInBytes: result.sizeInBytes,
          fileCount: result.fileCount,
        });
      } else {
        this.logger.warn(`[${executionId}] Scheduled backup failed`, {
          duration,
          error: result.error,
        });
      }
    } catch (error) {
      const duration = Date.now() - startTime;
      this.logger.error(
        `[${executionId}] Scheduled backup execution failed after ${duration}ms`,
        toError(error),
        {
          cronExpression: this.config.cronExpression,
          timezone: this.config.timezone || 'UTC',
        }
      );
    } finally {
      this.isBackupRunning = false;
    }
  }

  /**
   * Generate unique execution ID for tracking
   */
  private generateExecutionId(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const random = Math.random().toString(36).substring(2, 6);
    return `cron-${timestamp}-${random}`;
  }
}
