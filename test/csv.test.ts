import { describe, expect, it } from 'vitest';
import { CSV_HEADER, escapeCsvField, formatCsvRow, parseCsv, recordToRow } from '../src/lib/csv.js';

describe('formatCsvRow', () => {
  it('should join plain fields with commas', () => {
    expect(formatCsvRow(['a', 'b', '', 'd'])).toBe('a,b,,d\n');
  });

  it('should write the header', () => {
    expect(formatCsvRow(CSV_HEADER)).toBe('url,end_url,page_title,article_title\n');
  });

  it('should quote fields with commas, quotes or newlines', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsvField('plain')).toBe('plain');
  });

  it('should serialize a record in column order', () => {
    const row = recordToRow({
      url: 'https://t.co/x',
      endUrl: 'https://twitter.com/a/status/1,https://twitter.com/b/status/2',
      pageTitle: 'Title',
      articleTitle: '',
    });
    expect(formatCsvRow(row)).toBe(
      'https://t.co/x,"https://twitter.com/a/status/1,https://twitter.com/b/status/2",Title,\n'
    );
  });
});

describe('parseCsv', () => {
  it('should parse plain and quoted fields', () => {
    const rows = parseCsv('a,b,c\n"x,1","say ""hi""",\n');
    expect(rows).toEqual([
      { line: 1, fields: ['a', 'b', 'c'] },
      { line: 2, fields: ['x,1', 'say "hi"', ''] },
    ]);
  });

  it('should accept CRLF line endings and a missing final newline', () => {
    expect(parseCsv('a,b\r\nc,d')).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 2, fields: ['c', 'd'] },
    ]);
  });

  it('should keep newlines inside quoted fields', () => {
    expect(parseCsv('"one\ntwo",x\nnext,y\n')).toEqual([
      { line: 1, fields: ['one\ntwo', 'x'] },
      { line: 3, fields: ['next', 'y'] },
    ]);
  });

  it('should skip blank lines', () => {
    expect(parseCsv('a\n\nb\n')).toEqual([
      { line: 1, fields: ['a'] },
      { line: 3, fields: ['b'] },
    ]);
  });

  it('should report a malformed row and carry on with the next line', () => {
    expect(parseCsv('a,b"c\nok,row\n')).toEqual([
      { line: 1, error: 'unexpected quote in unquoted field' },
      { line: 2, fields: ['ok', 'row'] },
    ]);
  });

  it('should report text after a closing quote', () => {
    const [row] = parseCsv('"a"b,c\n');
    expect(row).toEqual({ line: 1, error: 'unexpected character after closing quote: "b"' });
  });

  it('should report an unterminated quoted field', () => {
    expect(parseCsv('ok,1\n"never closed,2\n')).toEqual([
      { line: 1, fields: ['ok', '1'] },
      { line: 2, error: 'unterminated quoted field' },
    ]);
  });

  it('should resume after the row start when a quoted field never closes', () => {
    expect(parseCsv('"never closed,1\nok,2\nok,3\n')).toEqual([
      { line: 1, error: 'unterminated quoted field' },
      { line: 2, fields: ['ok', '2'] },
      { line: 3, fields: ['ok', '3'] },
    ]);
  });

  it('should read back what formatCsvRow writes', () => {
    const fields = ['https://a.com/?q=1,2', 'He said "no"', 'multi\nline', ''];
    expect(parseCsv(formatCsvRow(fields))).toEqual([{ line: 1, fields }]);
  });
});
