import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import type { Logger } from './logger.js';
import type { DispatchStats, UrlCache, UrlRecord } from './types.js';
import { ResultChannel, WorkerPool } from './WorkerPool.js';

// Type for the callback used by the _flush method
type FlushCallback = (error?: Error | null) => void;

export interface DispatcherOptions {
  cache: UrlCache;
  /** Maximum number of URLs processed concurrently. */
  maxWorkers: number;
  /** Produces the record for a URL missing from the cache, `null` for no record. */
  process: (url: string) => Promise<UrlRecord | null>;
  logger: Logger;
}

/**
 * A Transform stream that receives candidate URLs in input order and emits
 * `UrlRecord`s.
 *
 * Cached URLs are answered on the spot, so their records keep input order.
 * Other URLs go to a bounded worker pool; their records are emitted once the
 * input has ended and the pool has drained, in completion order. A URL is
 * handled at most once per run.
 */
export class UrlDispatcher extends Transform {
  private readonly seenUrls = new Set<string>();
  private readonly channel = new ResultChannel<UrlRecord | null>();
  private readonly pool: WorkerPool<UrlRecord | null>;
  private readonly stats: DispatchStats = { cached: 0, fetched: 0, failed: 0, duplicates: 0 };

  constructor(private readonly options: DispatcherOptions) {
    super({ readableObjectMode: true, writableObjectMode: true });
    this.pool = new WorkerPool(options.maxWorkers, this.channel);
  }

  /** A snapshot of the counters; final once the stream has ended. */
  getStats(): DispatchStats {
    return { ...this.stats };
  }

  _transform(url: string, encoding: BufferEncoding, callback: TransformCallback): void {
    if (this.seenUrls.has(url)) {
      this.stats.duplicates += 1;
      callback();
      return; // Already handled in this run
    }
    this.seenUrls.add(url);

    const cached = this.options.cache.get(url);
    if (cached) {
      this.stats.cached += 1;
      this.options.logger.debug(`[CACHED] ${url}`);
      callback(null, { url, ...cached });
      return;
    }

    // Holding the callback until a worker is free keeps the input from racing ahead
    this.pool.submit(() => this.options.process(url)).then(() => callback(), callback);
  }

  /**
   * Called when the input ends: waits for every submitted URL, then receives
   * exactly as many results as were submitted.
   */
  _flush(callback: FlushCallback): void {
    this.drain().then(() => callback(), callback);
  }

  private async drain(): Promise<void> {
    await this.pool.join();

    const expected = this.pool.submittedCount;
    for (let received = 0; received < expected; received++) {
      const record = await this.channel.receive();
      if (record) {
        this.stats.fetched += 1;
        this.push(record);
      } else {
        this.stats.failed += 1;
      }
    }

    const { cached, fetched, failed, duplicates } = this.stats;
    this.options.logger.info('Dispatch complete', { cached, fetched, failed, duplicates });
  }
}
