/**
 * Environment variable utilities
 * Consistent parsing of boolean and optional values
 */

/**
 * Parse falsy environment variable
 * Accepts: 0, false, no, off (case-insensitive)
 */
export const isFalse = (v?: string): boolean =>
  /^(0|false|no|off)$/i.test(String(v || ''));

/**
 * Get environment variable with default
 */
export const getEnv = (key: string, defaultValue = ''): string =>
  process.env[key]?.trim() || defaultValue;

/**
 * Get integer environment variable with default
 */
export const getEnvInt = (key: string, defaultValue: number): number => {
  const val = process.env[key];
  if (!val) return defaultValue;
  const parsed = parseInt(val, 10);
  return Number.isFinite(parsed) ? parsed : defaultValue;
};
