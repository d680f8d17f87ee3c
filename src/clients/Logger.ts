import winston from 'winston';
import { Logger as ILogger, LogLevel } from '../interfaces/Logger';

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: Record<string, unknown> = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry['stack'] = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry['meta'] = meta;
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const errorMeta = {
      ...meta,
      ...(error && { error: describeError(error) }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta);
  }

  logBackupStart(sourceRoot: string, meta?: Record<string, unknown>): void {
    this.info('Backup operation started', {
      operation: 'backup_start',
      sourceRoot,
      ...meta,
    });
  }

  logBackupComplete(destination: string, sizeInBytes: number, fileCount: number, duration: number): void {
    this.info('Backup operation completed successfully', {
      operation: 'backup_complete',
      destination,
      sizeInBytes,
      fileCount,
      duration,
      sizeMB: Math.round((sizeInBytes / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(operation: string, error: Error, meta?: Record<string, unknown>): void {
    this.error(`Backup operation failed: ${operation}`, error, {
      operation: 'backup_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config,
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  /**
   * Create a logger instance with the specified log level from environment
   */
  static createFromEnvironment(): Logger {
    const requested = process.env['LOG_LEVEL']?.toLowerCase();
    if (requested === undefined) {
      return new Logger(LogLevel.INFO);
    }

    const logLevel = Object.values(LogLevel).find(level => level === requested);
    if (!logLevel) {
      console.warn(`Invalid LOG_LEVEL: ${process.env['LOG_LEVEL']}. Using INFO level.`);
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }
}

/**
 * Name, message and stack of an error, plus the Node system error fields when present
 */
function describeError(error: Error): Record<string, unknown> {
  const details: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  for (const field of ['code', 'errno', 'syscall', 'path'] as const) {
    if (field in error) {
      const value: unknown = Reflect.get(error, field);
      if (value !== undefined && value !== null && value !== '') {
        details[field] = value;
      }
    }
  }

  return details;
}
