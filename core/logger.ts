import fs from 'node:fs';
import path from 'node:path';
import { getEnv, isFalse } from './env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerOptions = {
  dir?: string;
  toFile?: boolean;
};

const LOG_FILE_NAME = 'app.log';
const MAX_BYTES = 2_000_000; // 2MB
const BACKUPS = 3;

function rotateIfNeeded(dir: string, filePath: string) {
  try {
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    if (!fs.existsSync(filePath)) return;
    const stat = fs.statSync(filePath);
    if (stat.size < MAX_BYTES) return;
    for (let i = BACKUPS - 1; i >= 0; i--) {
      const src = i === 0 ? filePath : `${filePath}.${i}`;
      const dst = `${filePath}.${i + 1}`;
      if (fs.existsSync(src)) {
        try { fs.renameSync(src, dst); } catch { /* next backup still rotates */ }
      }
    }
  } catch {
    // rotation is best effort; the append below reports nothing either
  }
}

function write(dir: string, line: string) {
  const filePath = path.join(dir, LOG_FILE_NAME);
  try {
    rotateIfNeeded(dir, filePath);
    fs.appendFileSync(filePath, line + '\n', 'utf8');
  } catch {
    // logging must never take the panel down
  }
}

function ts() {
  return new Date().toISOString();
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function getLogger(name = 'app', options: LoggerOptions = {}) {
  const dir = options.dir ?? path.resolve(getEnv('LOG_DIR', path.join(process.cwd(), 'logs')));
  const toFile = options.toFile ?? !isFalse(process.env.LOG_TO_FILE);
  const emit = (lvl: LogLevel, args: unknown[]) => {
    const msg = `${ts()} | ${lvl.toUpperCase()} | ${name} | ${args.map(formatArg).join(' ')}`;
    if (toFile) write(dir, msg);
    return msg;
  };
  return {
    debug: (...args: unknown[]) => { const msg = emit('debug', args); if (process.env.NODE_ENV !== 'production') console.debug(msg); },
    info:  (...args: unknown[]) => { const msg = emit('info', args);  console.log(msg); },
    warn:  (...args: unknown[]) => { const msg = emit('warn', args);  console.warn(msg); },
    error: (...args: unknown[]) => { const msg = emit('error', args); console.error(msg); },
  };
}

export type Logger = ReturnType<typeof getLogger>;
