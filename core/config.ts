import path from 'node:path';
import { getEnv, getEnvInt, isFalse } from './env.js';

export type HistoryLanguage = 'zh' | 'en';

export type AppConfig = {
  historyFile: string;
  pageSize: number; // rows shown before "load more"
  exportFileName: string; // suggested name in the save dialog
  language: HistoryLanguage;
  toastDurationMs: number;
  logDir: string;
  logToFile: boolean;
};

export const DEFAULT_PAGE_SIZE = 15;
export const DEFAULT_HISTORY_FILE = 'download_history.json';
export const DEFAULT_EXPORT_NAME = 'download_history.txt';
export const DEFAULT_TOAST_MS = 2000;

export function parseLanguage(input: string | undefined): HistoryLanguage {
  const val = String(input || '').trim().toLowerCase();
  if (val === 'en' || val.startsWith('en-')) return 'en';
  return 'zh';
}

function positiveInt(key: string, fallback: number): number {
  const n = getEnvInt(key, fallback);
  return n > 0 ? n : fallback;
}

export function loadConfig(): AppConfig {
  const cwd = process.cwd();
  return {
    historyFile: path.resolve(cwd, getEnv('HISTORY_FILE', DEFAULT_HISTORY_FILE)),
    pageSize: positiveInt('HISTORY_PAGE_SIZE', DEFAULT_PAGE_SIZE),
    exportFileName: getEnv('HISTORY_EXPORT_NAME', DEFAULT_EXPORT_NAME),
    language: parseLanguage(process.env.HISTORY_LANG),
    toastDurationMs: positiveInt('TOAST_DURATION_MS', DEFAULT_TOAST_MS),
    logDir: path.resolve(cwd, getEnv('LOG_DIR', 'logs')),
    logToFile: !isFalse(process.env.LOG_TO_FILE),
  };
}
