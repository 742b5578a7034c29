import { describe, expect, it } from 'vitest';
import { UI_COPY, translate } from '../ui/i18n.js';
import { DEFAULT_STATUS_COLOR, statusColor } from '../ui/statusColor.js';

describe('translate', () => {
  it('reads the built-in copy for each language', () => {
    expect(translate('load_more', 'zh')).toBe('加载更多');
    expect(translate('load_more', 'en')).toBe('Load More');
  });

  it('prefers a host-supplied entry and falls back per language', () => {
    const table = { history_label: { en: 'Downloads' } };
    expect(translate('history_label', 'en', table)).toBe('Downloads');
    expect(translate('history_label', 'zh', table)).toBe(UI_COPY.zh.history_label);
  });

  it('fills placeholders and leaves unknown ones alone', () => {
    expect(translate('export_success_message', 'en', {}, { path: '/tmp/h.txt' })).toBe(
      'History exported to: /tmp/h.txt'
    );
    expect(translate('export_failed_message', 'zh')).toBe('导出历史失败: {error}');
  });

  it('defines every key in both languages', () => {
    expect(Object.keys(UI_COPY.en).sort()).toEqual(Object.keys(UI_COPY.zh).sort());
  });
});

describe('statusColor', () => {
  it('colours finished and failed downloads', () => {
    expect(statusColor('Complete!')).toBe('#4CAF50');
    expect(statusColor('完成！')).toBe('#4CAF50');
    expect(statusColor('Download Failed')).toBe('#FF5252');
    expect(statusColor('下载失败')).toBe('#FF5252');
  });

  it('uses the neutral colour for anything else', () => {
    expect(statusColor('Downloading 42%')).toBe(DEFAULT_STATUS_COLOR);
    expect(statusColor('')).toBe('#00BCD4');
  });
});
