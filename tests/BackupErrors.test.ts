import { runInNewContext } from 'vm';
import {
  BackupError,
  IOError,
  asError,
  formatError,
  hasErrorCode,
  toError,
  toIOError,
} from '../src/errors/BackupErrors';

describe('BackupErrors', () => {
  // an error built in another realm, like the ones fs throws inside a Jest sandbox
  const foreignError = (): unknown =>
    runInNewContext("Object.assign(new Error('no such file'), { code: 'ENOENT' })");

  describe('hasErrorCode', () => {
    it('should match the code of an error from another realm', () => {
      expect(hasErrorCode(foreignError(), 'ENOENT')).toBe(true);
      expect(hasErrorCode(foreignError(), 'EACCES')).toBe(false);
    });

    it('should match plain objects carrying a code', () => {
      expect(hasErrorCode({ code: 'ENOTDIR' }, 'ENOTDIR')).toBe(true);
    });

    it('should not match values without a code', () => {
      expect(hasErrorCode(null, 'ENOENT')).toBe(false);
      expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
      expect(hasErrorCode(new Error('ENOENT'), 'ENOENT')).toBe(false);
    });
  });

  describe('asError', () => {
    it('should keep errors from another realm', () => {
      const error = foreignError();

      expect(asError(error)).toBe(error);
    });

    it('should drop values that are not errors', () => {
      expect(asError('boom')).toBeUndefined();
    });
  });

  describe('toError', () => {
    it('should wrap values that are not errors', () => {
      const error = toError(42);

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('42');
    });
  });

  describe('formatError', () => {
    it('should use the name and message of an error from another realm', () => {
      expect(formatError(foreignError())).toBe('Error: no such file');
    });
  });

  describe('toIOError', () => {
    it('should keep the cause of an error from another realm', () => {
      const cause = foreignError();

      const error = toIOError(cause, 'stat', '/games/minecraft/saves');

      expect(error).toBeInstanceOf(IOError);
      expect(error).toBeInstanceOf(BackupError);
      expect(error.message).toBe('Failed to stat /games/minecraft/saves: Error: no such file');
      expect(error.operation).toBe('stat');
      expect(error.path).toBe('/games/minecraft/saves');
      expect(error.cause).toBe(cause);
    });

    it('should return an existing IOError unchanged', () => {
      const original = new IOError('Failed to copy a', 'copy', 'a');

      expect(toIOError(original, 'stat', 'b')).toBe(original);
    });
  });
});
