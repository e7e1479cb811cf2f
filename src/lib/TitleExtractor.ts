import { parse, NodeType } from 'node-html-parser';
import type { HTMLElement, Node } from 'node-html-parser';
import { ExtractionError } from './errors.js';

export interface Titles {
  pageTitle: string;
  articleTitle: string;
}

/**
 * Trims and collapses every run of two or more whitespace characters,
 * embedded newlines included, to a single space. A lone newline or tab stays.
 */
export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s{2,}/g, ' ');
}

/**
 * Parses an HTML document.
 * @throws {ExtractionError} when the parser gives up on the markup.
 */
export function parseDocument(html: string): HTMLElement {
  try {
    return parse(html);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Unparsable HTML: ${reason}`);
  }
}

function collectText(node: Node, parts: string[]): void {
  if (node.nodeType === NodeType.TEXT_NODE) {
    const text = node.text.trim();
    if (text) {
      parts.push(text);
    }
    return;
  }
  for (const child of node.childNodes) {
    collectText(child, parts);
  }
}

/** Text nodes of an element, each trimmed, joined with a single space. */
function headingText(heading: HTMLElement): string {
  const parts: string[] = [];
  collectText(heading, parts);
  return normalizeWhitespace(parts.join(' '));
}

/**
 * Finds the page title (first `<title>`) and the article title (first `<h1>`
 * inside an `<article>`, else the first `<h1>` of the document).
 * Either may come back empty.
 */
export function extractTitles(root: HTMLElement): Titles {
  const titleElement = root.querySelector('title');
  const pageTitle = titleElement ? normalizeWhitespace(titleElement.textContent) : '';

  const heading = root.querySelector('article h1') ?? root.querySelector('h1');
  const articleTitle = heading ? headingText(heading) : '';

  return { pageTitle, articleTitle };
}
