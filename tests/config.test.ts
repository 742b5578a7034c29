import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, parseLanguage } from '../core/config.js';

const KEYS = [
  'HISTORY_FILE',
  'HISTORY_PAGE_SIZE',
  'HISTORY_EXPORT_NAME',
  'HISTORY_LANG',
  'TOAST_DURATION_MS',
  'LOG_DIR',
  'LOG_TO_FILE',
];

describe('loadConfig', () => {
  beforeEach(() => {
    for (const key of KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses documented defaults', () => {
    expect(loadConfig()).toEqual({
      historyFile: path.resolve(process.cwd(), 'download_history.json'),
      pageSize: 15,
      exportFileName: 'download_history.txt',
      language: 'zh',
      toastDurationMs: 2000,
      logDir: path.resolve(process.cwd(), 'logs'),
      logToFile: true,
    });
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('HISTORY_FILE', '/var/lib/dl/history.json');
    vi.stubEnv('HISTORY_PAGE_SIZE', '25');
    vi.stubEnv('HISTORY_EXPORT_NAME', 'export.txt');
    vi.stubEnv('HISTORY_LANG', 'en');
    vi.stubEnv('TOAST_DURATION_MS', '500');
    vi.stubEnv('LOG_DIR', '/tmp/dl-logs');
    vi.stubEnv('LOG_TO_FILE', 'off');
    expect(loadConfig()).toEqual({
      historyFile: '/var/lib/dl/history.json',
      pageSize: 25,
      exportFileName: 'export.txt',
      language: 'en',
      toastDurationMs: 500,
      logDir: '/tmp/dl-logs',
      logToFile: false,
    });
  });

  it('ignores page sizes that are not positive integers', () => {
    vi.stubEnv('HISTORY_PAGE_SIZE', '0');
    expect(loadConfig().pageSize).toBe(15);
    vi.stubEnv('HISTORY_PAGE_SIZE', 'lots');
    expect(loadConfig().pageSize).toBe(15);
    vi.stubEnv('HISTORY_PAGE_SIZE', '-3');
    expect(loadConfig().pageSize).toBe(15);
  });
});

describe('parseLanguage', () => {
  it('recognises English tags and falls back to Chinese', () => {
    expect(parseLanguage('EN')).toBe('en');
    expect(parseLanguage('en-US')).toBe('en');
    expect(parseLanguage('zh-CN')).toBe('zh');
    expect(parseLanguage('fr')).toBe('zh');
    expect(parseLanguage(undefined)).toBe('zh');
  });
});
