import { Agent, fetch } from 'undici';
import {
  InvalidUrlError,
  RedirectError,
  HttpStatusError,
  describeError,
  isRetryable,
} from './errors.js';
import type { Logger } from './logger.js';
import type { FetchedPage } from './types.js';
import { parseUrl } from './urls.js';

const USER_AGENT = 'title-grabber/0.1.0';
const BACKOFF_UNIT_MS = 1000;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpClientOptions {
  /** Seconds allowed to establish a connection. */
  connectTimeout: number;
  /** Seconds allowed for response headers, and between body chunks. */
  readTimeout: number;
  maxRedirects: number;
  /** Retries after the first attempt; total attempts are `maxRetries + 1`. */
  maxRetries: number;
  /** Length of one backoff step. The n-th retry waits n steps. */
  backoffUnitMs?: number;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * GETs pages through a shared connection pool, following redirects by hand so
 * the hop limit holds, and retrying transport errors, timeouts and 5xx
 * responses with a linear backoff.
 *
 * Safe for concurrent use: per-request state lives on the call stack.
 */
export class HttpClient {
  private readonly agent: Agent;
  private readonly maxRedirects: number;
  private readonly maxRetries: number;
  private readonly backoffUnitMs: number;

  constructor(options: HttpClientOptions, private readonly logger: Logger) {
    this.agent = new Agent({
      connect: { timeout: options.connectTimeout * 1000 },
      headersTimeout: options.readTimeout * 1000,
      bodyTimeout: options.readTimeout * 1000,
    });
    this.maxRedirects = options.maxRedirects;
    this.maxRetries = options.maxRetries;
    this.backoffUnitMs = options.backoffUnitMs ?? BACKOFF_UNIT_MS;
  }

  /**
   * Fetches a page, retrying as the policy allows.
   * @returns The page, or `null` once the URL has failed for good.
   */
  async fetchPage(url: string): Promise<FetchedPage | null> {
    return this.withRetries(url, () => this.fetchOnce(url, true));
  }

  /**
   * Follows a URL's redirects and returns where it ends up, discarding the body.
   * @returns The final location, or `null` once the URL has failed for good.
   */
  async resolveLocation(url: string): Promise<string | null> {
    const page = await this.withRetries(url, () => this.fetchOnce(url, false));
    return page ? page.url : null;
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private async withRetries(
    url: string,
    attempt: () => Promise<FetchedPage>
  ): Promise<FetchedPage | null> {
    for (let retries = 0; ; retries++) {
      try {
        const page = await attempt();
        this.logger.info(`GET ${url} - [${page.status}]`);
        return page;
      } catch (error) {
        if (isRetryable(error) && retries < this.maxRetries) {
          this.logger.warn(`GET ${url} [${describeError(error)}] - Retry: ${retries + 1}`);
          await sleep((retries + 1) * this.backoffUnitMs);
          continue;
        }
        this.logger.warn(`GET ${url} - [${describeError(error)}]`, {
          attempts: retries + 1,
        });
        return null;
      }
    }
  }

  /**
   * Performs one attempt: a GET per redirect hop, no retries.
   */
  private async fetchOnce(url: string, readBody: boolean): Promise<FetchedPage> {
    let currentUrl = url;
    if (!parseUrl(currentUrl)) {
      throw new InvalidUrlError(url);
    }

    for (let redirects = 0; ; redirects++) {
      const response = await fetch(currentUrl, {
        dispatcher: this.agent,
        redirect: 'manual',
        headers: { 'User-Agent': USER_AGENT },
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        await response.body?.cancel();
        if (!location) {
          throw new RedirectError(`Redirect from ${currentUrl} has no Location header`);
        }
        if (redirects >= this.maxRedirects) {
          throw new RedirectError(`Too many redirects (max ${this.maxRedirects}) from ${url}`);
        }
        const next = parseUrl(location, currentUrl);
        if (!next) {
          throw new RedirectError(`Unparsable redirect Location from ${currentUrl}: ${location}`);
        }
        this.logger.debug(`Redirect ${currentUrl} -> ${next.href}`, { status: response.status });
        currentUrl = next.href;
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpStatusError(response.status, currentUrl);
      }

      if (!readBody) {
        await response.body?.cancel();
        return { url: currentUrl, status: response.status, body: '' };
      }
      return { url: currentUrl, status: response.status, body: await response.text() };
    }
  }
}
