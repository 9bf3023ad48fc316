/**
 * CSV Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseCSV, parseCSVLine } from '../../../core/utils/csv.js';

describe('parseCSVLine', () => {
  it('splits plain fields and keeps their whitespace', () => {
    expect(parseCSVLine('a, b ,c')).toEqual(['a', ' b ', 'c']);
  });

  it('keeps whitespace inside quotes', () => {
    expect(parseCSVLine('"  KEY-001",x')).toEqual(['  KEY-001', 'x']);
  });

  it('keeps commas inside quotes', () => {
    expect(parseCSVLine('"a,b",c')).toEqual(['a,b', 'c']);
  });

  it('unescapes doubled quotes', () => {
    expect(parseCSVLine('"say ""hi""",x')).toEqual(['say "hi"', 'x']);
  });

  it('keeps trailing empty fields', () => {
    expect(parseCSVLine('a,')).toEqual(['a', '']);
  });
});

describe('parseCSV', () => {
  it('lower-cases headers and numbers rows by source line', () => {
    const parsed = parseCSV('Key,Name\nK1,one\n\nK2,two\n');

    expect(parsed.headers).toEqual(['key', 'name']);
    expect(parsed.rows).toEqual([
      { lineNumber: 2, values: ['K1', 'one'] },
      { lineNumber: 4, values: ['K2', 'two'] },
    ]);
  });

  it('trims header names but not values', () => {
    const parsed = parseCSV(' Key , Name\n K1 ,one\n');

    expect(parsed.headers).toEqual(['key', 'name']);
    expect(parsed.rows).toEqual([{ lineNumber: 2, values: [' K1 ', 'one'] }]);
  });

  it('handles CRLF line endings and a byte order mark', () => {
    const parsed = parseCSV('\uFEFFkey\r\nK1\r\n');
    expect(parsed.headers).toEqual(['key']);
    expect(parsed.rows).toEqual([{ lineNumber: 2, values: ['K1'] }]);
  });

  it('returns no headers for an empty document', () => {
    expect(parseCSV('')).toEqual({ headers: [], rows: [] });
  });
});
