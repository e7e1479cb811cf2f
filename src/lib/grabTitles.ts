import { createReadStream, createWriteStream } from 'fs';
import { rename, rm } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { loadCache } from './CacheLoader.js';
import type { GrabberConfig } from './config.js';
import { CsvWriter } from './CsvWriter.js';
import { HttpClient } from './HttpClient.js';
import type { HttpClientOptions } from './HttpClient.js';
import type { Logger } from './logger.js';
import { PermalinkResolver } from './PermalinkResolver.js';
import type { DispatchStats } from './types.js';
import { UrlDispatcher } from './UrlDispatcher.js';
import { UrlProcessor } from './UrlProcessor.js';
import { UrlScanner } from './UrlScanner.js';

/**
 * Yields the text of every input file in order. A newline goes between files
 * so the last line of one never runs into the first line of the next.
 */
async function* readInputs(paths: readonly string[], logger: Logger): AsyncGenerator<string> {
  for (const path of paths) {
    logger.info(`FILE: ${path}`);
    for await (const chunk of createReadStream(path, { encoding: 'utf8' })) {
      yield String(chunk);
    }
    yield '\n';
  }
}

/**
 * Runs the whole tool once: loads the previous output as a cache, streams
 * the input files through the scanner and the dispatcher, and replaces the
 * output file with the merged result.
 *
 * Per-URL failures never reach the caller. File-system failures on the inputs
 * or the output do, and leave the previous output untouched.
 */
export async function grabTitles(
  config: GrabberConfig,
  logger: Logger,
  httpOverrides: Partial<HttpClientOptions> = {}
): Promise<DispatchStats> {
  const cache = await loadCache(config.outputPath, logger);

  const http = new HttpClient(
    {
      connectTimeout: config.connectTimeout,
      readTimeout: config.readTimeout,
      maxRedirects: config.maxRedirects,
      maxRetries: config.maxRetries,
      ...httpOverrides,
    },
    logger
  );
  const processor = new UrlProcessor(http, new PermalinkResolver(http, logger), logger);
  const dispatcher = new UrlDispatcher({
    cache,
    maxWorkers: config.maxThreads,
    process: (url) => processor.process(url),
    logger,
  });

  const tmpPath = `${config.outputPath}.tmp`;
  try {
    await pipeline(
      readInputs(config.inputPaths, logger),
      new UrlScanner(),
      dispatcher,
      new CsvWriter(),
      createWriteStream(tmpPath)
    );
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  } finally {
    await http.close();
  }
  await rename(tmpPath, config.outputPath);

  const stats = dispatcher.getStats();
  logger.info(`Wrote ${stats.cached + stats.fetched} record(s) to ${config.outputPath}`);
  return stats;
}
