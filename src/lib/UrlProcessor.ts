import type { HttpClient } from './HttpClient.js';
import type { Logger } from './logger.js';
import type { PermalinkResolver } from './PermalinkResolver.js';
import { extractTitles, parseDocument } from './TitleExtractor.js';
import type { UrlRecord } from './types.js';

/**
 * Turns one URL into a record: fetch, parse, extract titles, and unwrap
 * permalink pages. Every failure stays inside `process`, which answers
 * `null` for a URL that produced nothing.
 */
export class UrlProcessor {
  constructor(
    private readonly http: Pick<HttpClient, 'fetchPage'>,
    private readonly permalinks: PermalinkResolver,
    private readonly logger: Logger
  ) {}

  async process(url: string): Promise<UrlRecord | null> {
    try {
      return await this.processUrl(url);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`[FAILED] ${url}: ${reason}`);
      return null;
    }
  }

  private async processUrl(url: string): Promise<UrlRecord | null> {
    const page = await this.http.fetchPage(url);
    if (!page) {
      return null;
    }

    const root = parseDocument(page.body);
    const { pageTitle, articleTitle } = extractTitles(root);

    let endUrl = page.url;
    const container = this.permalinks.findContainer(page.url, root);
    if (container) {
      endUrl = await this.permalinks.resolve(page.url, container);
    }

    this.logger.debug(`Processed ${url}`, { endUrl, pageTitle, articleTitle });
    return { url, endUrl, pageTitle, articleTitle };
  }
}
