import { z } from 'zod';
import { HistoryError } from './historyError.js';

const TextField = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

export const HistoryRecordSchema = z.object({
  url: TextField,
  status: TextField,
});

const HistoryFileSchema = z.array(z.unknown());

export type HistoryRecord = z.infer<typeof HistoryRecordSchema>;

/**
 * Decodes the backing file. The whole file must be a JSON array; entries
 * that are not `{ url, status }` objects are dropped.
 */
export function parseHistoryFile(raw: string): HistoryRecord[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new HistoryError('HISTORY_MALFORMED', `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const list = HistoryFileSchema.safeParse(json);
  if (!list.success) {
    throw new HistoryError('HISTORY_MALFORMED', 'History file is not a JSON array');
  }
  const records: HistoryRecord[] = [];
  for (const entry of list.data) {
    const parsed = HistoryRecordSchema.safeParse(entry);
    if (parsed.success) records.push(parsed.data);
  }
  return records;
}
