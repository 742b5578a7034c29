import { describe, expect, it } from 'vitest';
import { HistoryError } from '../core/historyError.js';
import { parseHistoryFile } from '../core/validate.js';

describe('parseHistoryFile', () => {
  it('decodes an array of records', () => {
    expect(parseHistoryFile('[{"url":"https://a","status":"完成！"}]')).toEqual([
      { url: 'https://a', status: '完成！' },
    ]);
  });

  it('accepts an empty array', () => {
    expect(parseHistoryFile('[]')).toEqual([]);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseHistoryFile('')).toThrow(HistoryError);
    expect(() => parseHistoryFile('[{')).toThrow(/Invalid JSON/);
  });

  it('rejects a document that is not an array', () => {
    expect(() => parseHistoryFile('{"url":"x"}')).toThrow('History file is not a JSON array');
    expect(() => parseHistoryFile('null')).toThrow('History file is not a JSON array');
  });

  it('defaults null fields and drops entries of the wrong shape', () => {
    expect(parseHistoryFile('[{"url":null},"text",[1],{"status":false},{}]')).toEqual([
      { url: '', status: '' },
      { url: '', status: '' },
    ]);
  });
});
