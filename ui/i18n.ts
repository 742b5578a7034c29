// ui/i18n.ts
import type { HistoryLanguage } from '../core/config.js';

export type TranslationKey =
  | 'history_label'
  | 'clear_btn'
  | 'export_history'
  | 'load_more'
  | 'empty_history'
  | 'search_text'
  | 'copy_action'
  | 'delete_action'
  | 'open_in_browser'
  | 'clear_confirm'
  | 'export_success'
  | 'export_success_message'
  | 'export_failed'
  | 'export_failed_message'
  | 'copied';

export type Translation = Record<TranslationKey, string>;

// Same shape hosts already keep: key -> language -> text.
export type TranslationTable = Partial<Record<TranslationKey, Partial<Record<HistoryLanguage, string>>>>;

export const UI_COPY: Record<HistoryLanguage, Translation> = {
  zh: {
    history_label: '下载历史',
    clear_btn: '清空全部',
    export_history: '导出历史',
    load_more: '加载更多',
    empty_history: '暂无下载历史',
    search_text: '搜索历史链接或状态',
    copy_action: '复制链接',
    delete_action: '删除记录',
    open_in_browser: '浏览器打开',
    clear_confirm: '确定要清空所有历史记录吗？',
    export_success: '导出成功',
    export_success_message: '历史已导出到: {path}',
    export_failed: '导出失败',
    export_failed_message: '导出历史失败: {error}',
    copied: '链接已复制',
  },
  en: {
    history_label: 'Download History',
    clear_btn: 'Clear All',
    export_history: 'Export History',
    load_more: 'Load More',
    empty_history: 'No download history yet',
    search_text: 'Search history links or status',
    copy_action: 'Copy Link',
    delete_action: 'Delete Record',
    open_in_browser: 'Open in Browser',
    clear_confirm: 'Are you sure you want to clear all history?',
    export_success: 'Export Complete',
    export_success_message: 'History exported to: {path}',
    export_failed: 'Export Failed',
    export_failed_message: 'Failed to export history: {error}',
    copied: 'Link copied',
  },
};

export function translate(
  key: TranslationKey,
  lang: HistoryLanguage,
  table: TranslationTable = {},
  vars: Record<string, string> = {}
): string {
  const text = table[key]?.[lang] ?? UI_COPY[lang][key];
  return text.replace(/\{(\w+)\}/g, (match, name: string) => vars[name] ?? match);
}
