import { describe, expect, it } from 'vitest';
import {
  extractTitles,
  normalizeWhitespace,
  parseDocument,
} from '../src/lib/TitleExtractor.js';

function titlesOf(html: string) {
  return extractTitles(parseDocument(html));
}

describe('normalizeWhitespace', () => {
  it('should trim and collapse runs of whitespace', () => {
    expect(normalizeWhitespace('  Foo  Bar \n\n Baz\t\tQux ')).toBe('Foo Bar Baz Qux');
  });

  it('should keep a single whitespace character as it is', () => {
    expect(normalizeWhitespace('Foo\nBar')).toBe('Foo\nBar');
    expect(normalizeWhitespace('Foo\tBar')).toBe('Foo\tBar');
    expect(normalizeWhitespace('Foo\n\nBar')).toBe('Foo Bar');
  });

  it('should be idempotent', () => {
    const samples = ['  a   b  ', 'x\n\ny', 'already normal', '', ' \t\n '];
    for (const sample of samples) {
      const once = normalizeWhitespace(sample);
      expect(normalizeWhitespace(once)).toBe(once);
    }
  });
});

describe('extractTitles', () => {
  it('should extract and normalize the page title', () => {
    expect(titlesOf('<html><head><title> Foo  Bar </title></head><body></body></html>')).toEqual({
      pageTitle: 'Foo Bar',
      articleTitle: '',
    });
  });

  it('should use the first title element', () => {
    const html = '<html><head><title>One</title><title>Two</title></head></html>';
    expect(titlesOf(html).pageTitle).toBe('One');
  });

  it('should collapse a title spread over several lines', () => {
    const html = '<title>\n  Multi\n\n    Line\n  Title\n</title>';
    expect(titlesOf(html).pageTitle).toBe('Multi Line Title');
  });

  it('should leave a lone tab inside the title', () => {
    expect(titlesOf('<title>A\tB</title>').pageTitle).toBe('A\tB');
  });

  it('should prefer the h1 inside an article', () => {
    const html = `
      <html><body>
        <h1>Site Name</h1>
        <article><h1>The Story</h1></article>
      </body></html>`;
    expect(titlesOf(html).articleTitle).toBe('The Story');
  });

  it('should fall back to the first h1 of the document', () => {
    const html = '<body><h2>Sub</h2><h1>Headline</h1><h1>Second</h1></body>';
    expect(titlesOf(html).articleTitle).toBe('Headline');
  });

  it('should join the text nodes of a heading with single spaces', () => {
    const html = '<article><h1>Breaking:<span>Big</span>  <em> news </em>today</h1></article>';
    expect(titlesOf(html).articleTitle).toBe('Breaking: Big news today');
  });

  it('should return empty titles for a document without them', () => {
    expect(titlesOf('<html><body><p>Just text</p></body></html>')).toEqual({
      pageTitle: '',
      articleTitle: '',
    });
  });

  it('should tolerate plain text bodies', () => {
    expect(titlesOf('not html at all')).toEqual({ pageTitle: '', articleTitle: '' });
  });
});
