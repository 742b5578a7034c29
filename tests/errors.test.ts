import { describe, expect, it } from 'vitest';
import { normalizeFsError } from '../core/errors.js';
import { HistoryError, isHistoryError } from '../core/historyError.js';

function errno(code: string, message = `${code}: failed`) {
  return Object.assign(new Error(message), { code });
}

describe('normalizeFsError', () => {
  it.each([
    ['ENOENT', 'FILE_NOT_FOUND', 'File or directory not found'],
    ['EACCES', 'PERMISSION_DENIED', 'Permission denied'],
    ['EPERM', 'PERMISSION_DENIED', 'Permission denied'],
    ['ENOSPC', 'DISK_FULL', 'No space left on device'],
    ['EISDIR', 'IS_DIRECTORY', 'Target path is a directory'],
  ])('maps %s to %s', (code, expected, message) => {
    const err = normalizeFsError(errno(code));
    expect(isHistoryError(err)).toBe(true);
    expect(err.code).toBe(expected);
    expect(err.message).toBe(message);
  });

  it('keeps the first line of unknown errors', () => {
    const err = normalizeFsError(errno('EIO', 'EIO: i/o error, write\n    at Object.writeFileSync'));
    expect(err.code).toBe('IO_ERROR');
    expect(err.message).toBe('I/O error: EIO: i/o error, write');
  });

  it('handles values that are not errors', () => {
    expect(normalizeFsError(undefined).message).toBe('I/O error');
    expect(normalizeFsError('disk gone').message).toBe('I/O error: disk gone');
  });

  it('passes history errors through untouched', () => {
    const original = new HistoryError('HISTORY_MALFORMED', 'bad file');
    expect(normalizeFsError(original)).toBe(original);
  });
});

describe('HistoryError', () => {
  it('defaults the message to the code', () => {
    const err = new HistoryError('DISK_FULL');
    expect(err.message).toBe('DISK_FULL');
    expect(err.name).toBe('HistoryError');
    expect(err).toBeInstanceOf(Error);
  });
});
