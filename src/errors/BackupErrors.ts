import { types } from 'util';

/**
 * Base class for errors raised by backup operations
 */
export class BackupError extends Error {
  constructor(message: string, public readonly operation: string, public readonly cause?: Error) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A file or directory could not be read, written or created
 */
export class IOError extends BackupError {
  constructor(message: string, operation: string, public readonly path: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'IOError';
  }
}

/**
 * Backup metadata could not be converted to or from JSON
 */
export class SerializationError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'serialization', cause);
    this.name = 'SerializationError';
  }
}

export class InvalidConfigurationError extends BackupError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'validation');
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Wrap an unknown thrown value as an IOError for the given path
 */
export function toIOError(error: unknown, operation: string, path: string): IOError {
  if (error instanceof IOError) {
    return error;
  }
  return new IOError(`Failed to ${operation} ${path}: ${formatError(error)}`, operation, path, asError(error));
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (isError(error)) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Errors thrown by Node's fs inside a Jest sandbox come from another realm,
 * so `instanceof Error` alone misses them.
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error || types.isNativeError(error);
}

export function asError(error: unknown): Error | undefined {
  return isError(error) ? error : undefined;
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(String(error));
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
