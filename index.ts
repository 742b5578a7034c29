import { loadConfig } from './core/config.js';
import type { AppConfig } from './core/config.js';
import { HistoryStore } from './core/history.js';
import { getLogger } from './core/logger.js';
import type { Logger } from './core/logger.js';
import { HistoryPanel } from './ui/HistoryPanel.js';
import type { PanelEffects } from './ui/HistoryPanel.js';
import type { TranslationTable } from './ui/i18n.js';
import { systemEffects } from './ui/systemEffects.js';
import { Toast } from './ui/toast.js';

export { loadConfig, parseLanguage, DEFAULT_PAGE_SIZE } from './core/config.js';
export type { AppConfig, HistoryLanguage } from './core/config.js';
export { HistoryStore, formatExport } from './core/history.js';
export type { ExportResult, HistoryRecord, HistoryStoreOptions } from './core/history.js';
export { HistoryError, isHistoryError } from './core/historyError.js';
export type { HistoryErrorCode } from './core/historyError.js';
export { normalizeFsError } from './core/errors.js';
export { getLogger } from './core/logger.js';
export type { Logger, LogLevel } from './core/logger.js';
export { parseHistoryFile, HistoryRecordSchema } from './core/validate.js';
export { HistoryPanel } from './ui/HistoryPanel.js';
export type { HistoryRow, MenuEntry, PanelEffects, PanelLabels, PanelView, RowAction } from './ui/HistoryPanel.js';
export { UI_COPY, translate } from './ui/i18n.js';
export type { Translation, TranslationKey, TranslationTable } from './ui/i18n.js';
export { statusColor } from './ui/statusColor.js';
export { Toast } from './ui/toast.js';
export type { ToastState } from './ui/toast.js';
export { systemEffects } from './ui/systemEffects.js';

export type CreatePanelOptions = {
  // Dialog effects have no headless default; clipboard and browser fall back to systemEffects.
  effects: Pick<PanelEffects, 'confirm' | 'pickExportPath' | 'notify'> & Partial<PanelEffects>;
  config?: AppConfig;
  translations?: TranslationTable;
  log?: Logger;
};

export function createHistoryPanel(options: CreatePanelOptions): HistoryPanel {
  const config = options.config ?? loadConfig();
  const log = options.log ?? getLogger('history', { dir: config.logDir, toFile: config.logToFile });
  const store = new HistoryStore({ historyFile: config.historyFile, pageSize: config.pageSize, log });
  return new HistoryPanel({
    store,
    effects: { ...systemEffects(log), ...options.effects },
    language: config.language,
    translations: options.translations,
    toast: new Toast(config.toastDurationMs),
    exportFileName: config.exportFileName,
  });
}
