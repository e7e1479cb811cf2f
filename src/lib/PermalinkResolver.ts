import type { HTMLElement } from 'node-html-parser';
import type { HttpClient } from './HttpClient.js';
import type { Logger } from './logger.js';
import { isFullUrl, isStatusPath, parseUrl } from './urls.js';

/** Joins the permalinks of a composite `endUrl`. */
export const END_URL_SEPARATOR = ',';

/**
 * Describes the social host whose permalink pages are unwrapped, and where on
 * those pages the embedded links live.
 */
export interface PermalinkHost {
  hostnames: readonly string[];
  /** Origin that relative links on the page resolve against. */
  origin: string;
  containerSelector: string;
  /** Links in the post text; `data-expanded-url` holds the unshortened target. */
  textLinkSelector: string;
  /** Link to a quoted post, usually a relative path. */
  quoteLinkSelector: string;
}

export const TWITTER: PermalinkHost = {
  hostnames: ['twitter.com', 'www.twitter.com', 'mobile.twitter.com'],
  origin: 'https://twitter.com',
  containerSelector: '.permalink-tweet-container',
  textLinkSelector: '.js-tweet-text-container a',
  quoteLinkSelector: '.QuoteTweet-link',
};

type Resolver = Pick<HttpClient, 'resolveLocation'>;

/**
 * Rewrites the end URL of a permalink page to the status permalinks it embeds,
 * following each embedded link to its final location first.
 */
export class PermalinkResolver {
  constructor(
    private readonly http: Resolver,
    private readonly logger: Logger,
    private readonly host: PermalinkHost = TWITTER
  ) {}

  /** Whether `pageUrl` is on the permalink host. */
  isPermalinkHost(pageUrl: string): boolean {
    const parsed = parseUrl(pageUrl);
    return parsed !== null && this.onHost(parsed);
  }

  /** Returns the permalink container when the page has one and is on the host. */
  findContainer(pageUrl: string, root: HTMLElement): HTMLElement | null {
    if (!this.isPermalinkHost(pageUrl)) {
      return null;
    }
    return root.querySelector(this.host.containerSelector);
  }

  /**
   * Computes the `endUrl` for a page already known to be on the permalink host.
   * Falls back to `pageUrl` when no embedded permalink survives.
   */
  async resolve(pageUrl: string, container: HTMLElement): Promise<string> {
    const candidates: string[] = [];
    for (const raw of this.collectTargets(container)) {
      const candidate = isFullUrl(raw) ? await this.follow(raw) : raw;
      if (candidate !== null) {
        candidates.push(candidate);
      }
    }

    const permalinks = new Set<string>();
    for (const candidate of candidates) {
      const parsed = parseUrl(candidate, this.host.origin);
      if (!parsed) {
        this.logger.debug(`Dropping unparsable link ${candidate}`, { page: pageUrl });
        continue;
      }
      // Relative links never went through `follow`: profiles, hashtags, the homepage
      if (this.isHostPageOtherThanStatus(parsed)) {
        continue;
      }
      permalinks.add(parsed.href);
    }

    const joined = [...permalinks].sort().join(END_URL_SEPARATOR);
    if (!joined) {
      this.logger.debug(`No embedded permalinks on ${pageUrl}`);
      return pageUrl;
    }
    return joined;
  }

  /** Non-empty link targets from both content blocks, de-duplicated, in page order. */
  collectTargets(container: HTMLElement): string[] {
    const targets = new Set<string>();
    for (const link of container.querySelectorAll(this.host.textLinkSelector)) {
      const target = link.getAttribute('data-expanded-url') || link.getAttribute('href');
      if (target) {
        targets.add(target);
      }
    }
    for (const link of container.querySelectorAll(this.host.quoteLinkSelector)) {
      const target = link.getAttribute('href');
      if (target) {
        targets.add(target);
      }
    }
    return [...targets];
  }

  /**
   * Resolves a full URL to its final location. Links that land on a host page
   * other than a status are dropped; links that cannot be fetched are kept as
   * written.
   */
  private async follow(raw: string): Promise<string | null> {
    const resolved = await this.http.resolveLocation(raw);
    if (resolved === null) {
      return raw;
    }
    const parsed = parseUrl(resolved);
    if (parsed && this.isHostPageOtherThanStatus(parsed)) {
      this.logger.debug(`Dropping ${raw}: resolved to ${resolved}`);
      return null;
    }
    return resolved;
  }

  private onHost(url: URL): boolean {
    return this.host.hostnames.includes(url.hostname);
  }

  private isHostPageOtherThanStatus(url: URL): boolean {
    return this.onHost(url) && !isStatusPath(url.pathname);
  }
}
