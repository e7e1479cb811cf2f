import { Readable } from 'stream';
import { describe, expect, it } from 'vitest';
import { UrlScanner } from '../src/lib/UrlScanner.js';
import { findFirstUrl } from '../src/lib/urls.js';

/**
 * Helper function to test the UrlScanner stream.
 * It creates a Readable stream from an array of chunks,
 * pipes it through UrlScanner, and collects the output.
 */
function testStreamScanner(chunks: string[]): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const readable = Readable.from(chunks);
    const scanner = new UrlScanner();
    const output: string[] = [];

    scanner.on('data', (data: string) => {
      output.push(data);
    });
    scanner.on('end', () => {
      resolve(output);
    });
    scanner.on('error', (err) => {
      reject(err);
    });

    readable.pipe(scanner);
  });
}

describe('findFirstUrl', () => {
  it('should return the URL embedded in a line', () => {
    expect(findFirstUrl('see https://example.com/page1 thanks')).toBe(
      'https://example.com/page1'
    );
  });

  it('should only return the first URL of a line', () => {
    expect(findFirstUrl('http://a.com/1 and https://b.com/2')).toBe('http://a.com/1');
  });

  it('should keep punctuation up to the next whitespace', () => {
    expect(findFirstUrl('"https://example.com/a?b=1,c",x')).toBe('https://example.com/a?b=1,c",x');
  });

  it('should return null when there is no URL', () => {
    expect(findFirstUrl('no links here, just www.example.com')).toBeNull();
    expect(findFirstUrl('ftp://example.com/file')).toBeNull();
  });
});

describe('UrlScanner', () => {
  it('should emit one URL per line', async () => {
    const output = await testStreamScanner([
      'first https://a.com/1\nsecond http://b.com/2\n',
    ]);
    expect(output).toEqual(['https://a.com/1', 'http://b.com/2']);
  });

  it('should emit nothing for lines without a URL', async () => {
    const output = await testStreamScanner(['nothing here\n\njust text\n']);
    expect(output).toEqual([]);
  });

  it('should pin first-match-only per line', async () => {
    const output = await testStreamScanner(['https://a.com https://b.com\n']);
    expect(output).toEqual(['https://a.com']);
  });

  it('should handle lines split across chunks', async () => {
    const output = await testStreamScanner(['text https://exa', 'mple.com/long', '/path more\nhttps://b.com\n']);
    expect(output).toEqual(['https://example.com/long/path', 'https://b.com']);
  });

  it('should scan a final line without a newline', async () => {
    const output = await testStreamScanner(['https://a.com\nhttps://b.com']);
    expect(output).toEqual(['https://a.com', 'https://b.com']);
  });

  it('should not include the carriage return of CRLF lines', async () => {
    const output = await testStreamScanner(['https://a.com/x\r\nhttps://b.com/y\r\n']);
    expect(output).toEqual(['https://a.com/x', 'https://b.com/y']);
  });

  it('should keep duplicates for the dispatcher to handle', async () => {
    const output = await testStreamScanner(['https://a.com\nhttps://a.com\n']);
    expect(output).toEqual(['https://a.com', 'https://a.com']);
  });
});
