import { HistoryError, isHistoryError } from './historyError.js';

function errnoCode(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') return e.code;
  return '';
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? '');
}

// Maps fs failures onto the codes the panel shows to the user.
export function normalizeFsError(e: unknown): HistoryError {
  if (isHistoryError(e)) return e;
  const code = errnoCode(e);
  switch (code) {
    case 'ENOENT':
      return new HistoryError('FILE_NOT_FOUND', 'File or directory not found');
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return new HistoryError('PERMISSION_DENIED', 'Permission denied');
    case 'ENOSPC':
    case 'EDQUOT':
      return new HistoryError('DISK_FULL', 'No space left on device');
    case 'EISDIR':
      return new HistoryError('IS_DIRECTORY', 'Target path is a directory');
    default: {
      const detail = errorMessage(e).split(/\r?\n/).map((line) => line.trim()).filter(Boolean)[0] ?? '';
      return new HistoryError('IO_ERROR', detail ? `I/O error: ${detail}` : 'I/O error');
    }
  }
}
