import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from './logger.js';
import { DEFAULT_PAGE_SIZE } from './config.js';
import { normalizeFsError } from './errors.js';
import { isHistoryError } from './historyError.js';
import type { HistoryErrorCode } from './historyError.js';
import { parseHistoryFile } from './validate.js';
import type { HistoryRecord } from './validate.js';

export type { HistoryRecord };

export type HistoryStoreOptions = {
  historyFile: string;
  pageSize?: number;
  log: Logger;
};

export type ExportResult =
  | { ok: true; path: string; count: number }
  | { ok: false; path: string; error: { code: HistoryErrorCode; message: string } };

function normalizeSearch(searchText: string): string {
  return searchText.trim().toLowerCase();
}

function copyRecord(item: HistoryRecord): HistoryRecord {
  return { url: item.url, status: item.status };
}

function sameRecord(a: HistoryRecord, b: HistoryRecord): boolean {
  return a.url === b.url && a.status === b.status;
}

export function formatExport(records: readonly HistoryRecord[]): string {
  return records.map((item) => `URL: ${item.url}\nStatus: ${item.status}\n\n`).join('');
}

/**
 * Ordered download history backed by a single JSON file.
 *
 * Records are kept oldest first; every view handed out is newest first.
 * Every mutation rewrites the whole file.
 */
export class HistoryStore {
  readonly historyFile: string;
  readonly pageSize: number;
  private readonly log: Logger;
  private items: HistoryRecord[] = [];
  private shown: number;

  constructor(options: HistoryStoreOptions) {
    this.historyFile = options.historyFile;
    const size = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.pageSize = Number.isInteger(size) && size > 0 ? size : DEFAULT_PAGE_SIZE;
    this.log = options.log;
    this.shown = this.pageSize;
  }

  get records(): readonly HistoryRecord[] {
    return this.items.map(copyRecord);
  }

  get visibleCount(): number {
    return this.shown;
  }

  get size(): number {
    return this.items.length;
  }

  load(): HistoryRecord[] {
    this.items = this.readFile();
    this.shown = this.pageSize;
    this.log.debug('history_loaded', { file: this.historyFile, count: this.items.length });
    return this.items.map(copyRecord);
  }

  save(): boolean {
    const tmp = `${this.historyFile}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.historyFile), { recursive: true });
      fs.writeFileSync(tmp, JSON.stringify(this.items, null, 2), 'utf8');
      fs.renameSync(tmp, this.historyFile);
      return true;
    } catch (err) {
      const normalized = normalizeFsError(err);
      this.log.error('history_save_failed', { file: this.historyFile, code: normalized.code, error: normalized.message });
      try {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
      } catch (cleanupErr) {
        this.log.debug('history_tmp_cleanup_failed', { error: String(cleanupErr) });
      }
      return false;
    }
  }

  add(url: string, status: string): HistoryRecord {
    this.items.push({ url, status });
    this.save();
    this.shown = Math.min(this.shown + 1, this.items.length);
    return { url, status };
  }

  clear(): void {
    this.items = [];
    this.save();
    this.log.info('history_cleared', { file: this.historyFile });
  }

  query(searchText: string, visibleCount: number = this.shown): HistoryRecord[] {
    const count = Math.max(0, Math.floor(visibleCount));
    const page = count > 0 ? this.items.slice(-count).reverse().map(copyRecord) : [];
    const needle = normalizeSearch(searchText);
    if (!needle) return page;
    return page.filter(
      (item) => item.url.toLowerCase().includes(needle) || item.status.toLowerCase().includes(needle)
    );
  }

  hasMore(searchText: string, visibleCount: number = this.shown): boolean {
    return visibleCount < this.items.length && !normalizeSearch(searchText);
  }

  showMore(): void {
    this.shown += this.pageSize;
  }

  /**
   * Deletes the record shown at `viewIndex` of `filteredView`.
   *
   * The record is looked up in storage by its `(url, status)` pair, oldest
   * first, so with duplicates the oldest copy goes even if a newer one was
   * clicked.
   */
  deleteAt(filteredView: readonly HistoryRecord[], viewIndex: number): HistoryRecord | null {
    if (!Number.isInteger(viewIndex) || viewIndex < 0 || viewIndex >= filteredView.length) return null;
    const target = copyRecord(filteredView[viewIndex]);
    const idx = this.items.findIndex((item) => sameRecord(item, target));
    const removed = idx >= 0 ? this.items.splice(idx, 1)[0] : null;
    if (!removed) {
      this.log.warn('history_delete_missing', { url: target.url, status: target.status });
    }
    this.save();
    this.shown = Math.min(this.shown, this.items.length);
    return removed;
  }

  exportText(records: readonly HistoryRecord[] = this.items): string {
    return formatExport(records);
  }

  exportToFile(filePath: string): ExportResult {
    try {
      fs.writeFileSync(filePath, this.exportText(), 'utf8');
      this.log.info('history_exported', { path: filePath, count: this.items.length });
      return { ok: true, path: filePath, count: this.items.length };
    } catch (err) {
      const normalized = normalizeFsError(err);
      this.log.warn('history_export_failed', { path: filePath, code: normalized.code, error: normalized.message });
      return { ok: false, path: filePath, error: { code: normalized.code, message: normalized.message } };
    }
  }

  private readFile(): HistoryRecord[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.historyFile, 'utf8');
    } catch (err) {
      const normalized = normalizeFsError(err);
      if (normalized.code === 'FILE_NOT_FOUND') {
        this.log.debug('history_file_missing', { file: this.historyFile });
      } else {
        this.log.warn('history_read_failed', { file: this.historyFile, code: normalized.code, error: normalized.message });
      }
      return [];
    }
    try {
      return parseHistoryFile(raw);
    } catch (err) {
      const message = isHistoryError(err) ? err.message : String(err);
      this.log.warn('history_parse_failed', { file: this.historyFile, error: message });
      return [];
    }
  }
}
