/**
 * Defines the structure of one row of the output ledger.
 */
export interface UrlRecord {
  /** The URL exactly as it was matched in the input line. */
  url: string;
  /**
   * Where the URL finally led: the last redirect target, or the sorted,
   * comma-joined status permalinks embedded in a permalink page.
   */
  endUrl: string;
  /** Normalized text of the first `<title>`; empty when absent. */
  pageTitle: string;
  /** Normalized text of the article heading; empty when absent. */
  articleTitle: string;
}

/** The fields a previous run resolved for a URL. */
export type CachedFields = Omit<UrlRecord, 'url'>;

/** Previously resolved records keyed by source URL. Built once, never mutated. */
export type UrlCache = ReadonlyMap<string, CachedFields>;

/** A successfully fetched page, after redirects. */
export interface FetchedPage {
  /** The final location once every redirect was followed. */
  url: string;
  status: number;
  body: string;
}

/**
 * Counters describing one dispatch run.
 */
export interface DispatchStats {
  /** Records served from the cache without a request. */
  cached: number;
  /** Records computed from a fresh fetch. */
  fetched: number;
  /** URLs that produced no record. */
  failed: number;
  /** Repeated URLs skipped within the run. */
  duplicates: number;
}
