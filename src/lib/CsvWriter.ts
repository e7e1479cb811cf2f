import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import { CSV_HEADER, formatCsvRow, recordToRow } from './csv.js';
import type { UrlRecord } from './types.js';

/**
 * A Transform stream that turns `UrlRecord`s into CSV lines, preceded by the
 * header. The header is written even when no record arrives.
 */
export class CsvWriter extends Transform {
  private headerWritten = false;

  constructor() {
    super({ writableObjectMode: true });
  }

  _transform(record: UrlRecord, encoding: BufferEncoding, callback: TransformCallback): void {
    this.writeHeader();
    callback(null, formatCsvRow(recordToRow(record)));
  }

  _flush(callback: TransformCallback): void {
    this.writeHeader();
    callback();
  }

  private writeHeader(): void {
    if (!this.headerWritten) {
      this.headerWritten = true;
      this.push(formatCsvRow(CSV_HEADER));
    }
  }
}
