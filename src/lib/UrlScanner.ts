import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import { findFirstUrl } from './urls.js';

/**
 * A Transform stream that splits incoming text into lines and emits, for each
 * line, the first URL-shaped substring it contains.
 *
 * Lines may be split across chunks; a trailing line without a newline is
 * scanned when the input ends. Lines without a URL emit nothing.
 *
 * @example
 * // Input: "see https://a.com/x and https://b.com\nno url here\n"
 * // Output (chunks): "https://a.com/x"
 */
export class UrlScanner extends Transform {
  private buffer = '';

  constructor() {
    super({ readableObjectMode: true });
  }

  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.buffer += chunk.toString();

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      this.scanLine(this.buffer.slice(0, newline));
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf('\n');
    }

    callback();
  }

  _flush(callback: TransformCallback): void {
    if (this.buffer.length > 0) {
      this.scanLine(this.buffer);
      this.buffer = '';
    }
    callback();
  }

  private scanLine(line: string): void {
    const url = findFirstUrl(line);
    if (url) {
      this.push(url);
    }
  }
}
