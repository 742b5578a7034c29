export type HistoryErrorCode =
  | 'HISTORY_MALFORMED'
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'DISK_FULL'
  | 'IS_DIRECTORY'
  | 'IO_ERROR';

export class HistoryError extends Error {
  code: HistoryErrorCode;

  constructor(code: HistoryErrorCode, message?: string) {
    super(message || code);
    this.name = 'HistoryError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HistoryError);
    }
  }
}

export function isHistoryError(error: unknown): error is HistoryError {
  return error instanceof HistoryError;
}
