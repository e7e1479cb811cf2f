/**
 * @module title-grabber
 * This is the main library entry point.
 * It exports the pipeline stages and the run orchestrator.
 */

export { grabTitles } from './lib/grabTitles.js';
export { buildConfig, parseBooleanFlag, GrabberConfigSchema } from './lib/config.js';
export type { GrabberConfig, RawGrabberConfig } from './lib/config.js';
export { loadCache, buildCache } from './lib/CacheLoader.js';
export { UrlScanner } from './lib/UrlScanner.js';
export { UrlDispatcher } from './lib/UrlDispatcher.js';
export type { DispatcherOptions } from './lib/UrlDispatcher.js';
export { WorkerPool, ResultChannel } from './lib/WorkerPool.js';
export { HttpClient } from './lib/HttpClient.js';
export type { HttpClientOptions } from './lib/HttpClient.js';
export { UrlProcessor } from './lib/UrlProcessor.js';
export { PermalinkResolver, TWITTER, END_URL_SEPARATOR } from './lib/PermalinkResolver.js';
export type { PermalinkHost } from './lib/PermalinkResolver.js';
export { extractTitles, normalizeWhitespace, parseDocument } from './lib/TitleExtractor.js';
export { CsvWriter } from './lib/CsvWriter.js';
export { formatCsvRow, parseCsv, CSV_HEADER } from './lib/csv.js';
export { createLogger, silentLogger } from './lib/logger.js';
export type { Logger, LogMeta } from './lib/logger.js';
export * from './lib/errors.js';
export type { UrlRecord, CachedFields, UrlCache, FetchedPage, DispatchStats } from './lib/types.js';
