import type { UrlRecord } from './types.js';

export const CSV_HEADER = ['url', 'end_url', 'page_title', 'article_title'] as const;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(',')}\n`;
}

export function recordToRow(record: UrlRecord): string[] {
  return [record.url, record.endUrl, record.pageTitle, record.articleTitle];
}

export type CsvRow =
  | { line: number; fields: string[] }
  | { line: number; error: string };

/**
 * Splits CSV text into rows. A malformed row (a stray quote, text after a
 * closing quote, an unterminated quoted field) is reported as an error and
 * parsing resumes on the next line. For an unterminated field that is the line
 * after the one the row starts on.
 *
 * `line` is the 1-based line on which the row starts.
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let pos = 0;
  let line = 1;

  while (pos < text.length) {
    const rowStart = pos;
    const startLine = line;
    const fields: string[] = [];
    let field = '';
    let error: string | null = null;
    let rowDone = false;

    while (!rowDone && error === null) {
      if (text[pos] === '"') {
        // Quoted field
        pos += 1;
        let closed = false;
        while (pos < text.length) {
          const char = text[pos];
          if (char === '"') {
            if (text[pos + 1] === '"') {
              field += '"';
              pos += 2;
              continue;
            }
            pos += 1;
            closed = true;
            break;
          }
          if (char === '\n') {
            line += 1;
          }
          field += char;
          pos += 1;
        }
        if (!closed) {
          error = 'unterminated quoted field';
          // The open quote swallowed the rest of the text; rewind to the row
          pos = rowStart;
          line = startLine;
          break;
        }
        const next = text[pos];
        if (next !== undefined && next !== ',' && next !== '\n' && next !== '\r') {
          error = `unexpected character after closing quote: ${JSON.stringify(next)}`;
          break;
        }
      } else {
        while (pos < text.length && !',\r\n'.includes(text[pos])) {
          if (text[pos] === '"') {
            error = 'unexpected quote in unquoted field';
            break;
          }
          field += text[pos];
          pos += 1;
        }
        if (error !== null) {
          break;
        }
      }

      fields.push(field);
      field = '';

      const separator = text[pos];
      if (separator === ',') {
        pos += 1;
      } else {
        // End of row: CRLF, LF, lone CR, or end of input
        if (separator === '\r') pos += 1;
        if (text[pos] === '\n') pos += 1;
        if (separator !== undefined) line += 1;
        rowDone = true;
      }
    }

    if (error !== null) {
      rows.push({ line: startLine, error });
      // Resume after the current physical line
      const newline = text.indexOf('\n', pos);
      pos = newline === -1 ? text.length : newline + 1;
      line += 1;
      continue;
    }

    // Blank lines carry no data
    if (fields.length === 1 && fields[0] === '') {
      continue;
    }
    rows.push({ line: startLine, fields });
  }

  return rows;
}
