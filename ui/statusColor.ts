export const STATUS_COLORS: Readonly<Record<string, string>> = {
  '完成！': '#4CAF50',
  'Complete!': '#4CAF50',
  '下载失败': '#FF5252',
  'Download Failed': '#FF5252',
};

export const DEFAULT_STATUS_COLOR = '#00BCD4';

export function statusColor(status: string): string {
  return STATUS_COLORS[status] ?? DEFAULT_STATUS_COLOR;
}
