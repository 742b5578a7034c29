import type { HistoryLanguage } from '../core/config.js';
import { DEFAULT_EXPORT_NAME } from '../core/config.js';
import type { HistoryRecord, HistoryStore } from '../core/history.js';
import { translate } from './i18n.js';
import type { TranslationKey, TranslationTable } from './i18n.js';
import { statusColor } from './statusColor.js';
import { Toast } from './toast.js';
import type { ToastState } from './toast.js';

export type NoticeKind = 'info' | 'warning';

// Host-side effects. The panel never touches the clipboard, a browser or a dialog itself.
export type PanelEffects = {
  copy: (text: string) => void;
  openInBrowser: (url: string) => void;
  confirm: (title: string, message: string) => boolean;
  pickExportPath: (suggestedName: string) => string | null;
  notify: (kind: NoticeKind, title: string, message: string) => void;
};

export type RowAction = 'copy' | 'delete' | 'open';

export type MenuEntry = {
  action: RowAction;
  label: string;
};

export type HistoryRow = {
  url: string;
  status: string;
  tooltip: string;
  statusColor: string;
};

export type PanelLabels = {
  title: string;
  clear: string;
  export: string;
  loadMore: string;
  empty: string;
  searchPlaceholder: string;
};

export type PanelView = {
  language: HistoryLanguage;
  labels: PanelLabels;
  searchText: string;
  rows: HistoryRow[];
  emptyVisible: boolean;
  loadMoreVisible: boolean;
  toast: ToastState;
};

export type HistoryPanelOptions = {
  store: HistoryStore;
  effects: PanelEffects;
  language: HistoryLanguage;
  translations?: TranslationTable;
  toast?: Toast;
  exportFileName?: string;
};

type ViewListener = (view: PanelView) => void;

const MENU_ACTIONS: ReadonlyArray<[RowAction, TranslationKey]> = [
  ['copy', 'copy_action'],
  ['delete', 'delete_action'],
  ['open', 'open_in_browser'],
];

export class HistoryPanel {
  private readonly store: HistoryStore;
  private readonly effects: PanelEffects;
  private readonly translations: TranslationTable;
  private readonly toast: Toast;
  private readonly exportFileName: string;
  private readonly listeners = new Set<ViewListener>();
  private readonly stopToast: () => void;
  private language: HistoryLanguage;
  private searchText = '';
  private shown: HistoryRecord[] = [];

  constructor(options: HistoryPanelOptions) {
    this.store = options.store;
    this.effects = options.effects;
    this.language = options.language;
    this.translations = options.translations ?? {};
    this.toast = options.toast ?? new Toast();
    this.exportFileName = options.exportFileName ?? DEFAULT_EXPORT_NAME;
    this.stopToast = this.toast.subscribe(() => this.emit());
    this.store.load();
    this.refresh();
  }

  view(): PanelView {
    const rows = this.shown.map((item) => ({
      url: item.url,
      status: item.status,
      tooltip: item.url,
      statusColor: statusColor(item.status),
    }));
    const empty = rows.length === 0;
    return {
      language: this.language,
      labels: {
        title: this.t('history_label'),
        clear: this.t('clear_btn'),
        export: this.t('export_history'),
        loadMore: this.t('load_more'),
        empty: this.t('empty_history'),
        searchPlaceholder: this.t('search_text'),
      },
      searchText: this.searchText,
      rows,
      emptyVisible: empty,
      loadMoreVisible: !empty && this.store.hasMore(this.searchText),
      toast: this.toast.current,
    };
  }

  subscribe(listener: ViewListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setSearchText(text: string) {
    this.searchText = text;
    this.refresh();
  }

  setLanguage(lang: HistoryLanguage) {
    this.language = lang;
    this.refresh();
  }

  loadMore() {
    this.store.showMore();
    this.refresh();
  }

  add(url: string, status: string): HistoryRecord {
    const item = this.store.add(url, status);
    this.refresh();
    return item;
  }

  rowMenu(rowIndex: number): MenuEntry[] | null {
    if (!this.rowAt(rowIndex)) return null;
    return MENU_ACTIONS.map(([action, key]) => ({ action, label: this.t(key) }));
  }

  runRowAction(rowIndex: number, action: RowAction) {
    const row = this.rowAt(rowIndex);
    if (!row) return;
    switch (action) {
      case 'copy':
        this.effects.copy(row.url);
        this.showToast(this.t('copied'));
        break;
      case 'delete':
        this.store.deleteAt(this.shown, rowIndex);
        this.refresh();
        break;
      case 'open':
        this.effects.openInBrowser(row.url);
        break;
    }
  }

  clear(): boolean {
    if (!this.effects.confirm(this.t('history_label'), this.t('clear_confirm'))) return false;
    this.store.clear();
    this.refresh();
    return true;
  }

  exportHistory(): boolean {
    const target = this.effects.pickExportPath(this.exportFileName);
    if (!target) return false;
    const result = this.store.exportToFile(target);
    if (result.ok) {
      this.effects.notify('info', this.t('export_success'), this.t('export_success_message', { path: result.path }));
      return true;
    }
    this.effects.notify('warning', this.t('export_failed'), this.t('export_failed_message', { error: result.error.message }));
    return false;
  }

  showToast(message: string, durationMs?: number) {
    this.toast.show(message, durationMs);
  }

  dispose() {
    this.stopToast();
    this.toast.dispose();
    this.listeners.clear();
  }

  private rowAt(rowIndex: number): HistoryRecord | undefined {
    return Number.isInteger(rowIndex) && rowIndex >= 0 ? this.shown[rowIndex] : undefined;
  }

  private refresh() {
    this.shown = this.store.query(this.searchText);
    this.emit();
  }

  private emit() {
    if (!this.listeners.size) return;
    const next = this.view();
    for (const listener of this.listeners) listener(next);
  }

  private t(key: TranslationKey, vars?: Record<string, string>) {
    return translate(key, this.language, this.translations, vars);
  }
}
