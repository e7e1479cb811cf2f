import { readFile } from 'fs/promises';
import { CSV_HEADER, parseCsv } from './csv.js';
import type { Logger } from './logger.js';
import type { CachedFields, UrlCache } from './types.js';

function isHeader(fields: readonly string[]): boolean {
  return fields.length === CSV_HEADER.length && fields.every((field, i) => field === CSV_HEADER[i]);
}

/**
 * Builds the cache from CSV text written by a previous run. Malformed rows
 * are skipped, and only rows with a page or article title are kept; a URL
 * listed twice keeps its first row.
 */
export function buildCache(text: string, logger: Logger): UrlCache {
  const cache = new Map<string, CachedFields>();
  let skipped = 0;

  for (const row of parseCsv(text)) {
    if ('error' in row) {
      skipped += 1;
      logger.debug(`Skipping malformed cache row: ${row.error}`, { line: row.line });
      continue;
    }
    const { fields } = row;
    if (isHeader(fields)) {
      continue;
    }
    if (fields.length !== CSV_HEADER.length) {
      skipped += 1;
      logger.debug(`Skipping cache row with ${fields.length} fields`, { line: row.line });
      continue;
    }

    const [url, endUrl, pageTitle, articleTitle] = fields;
    if (!url || (!pageTitle && !articleTitle) || cache.has(url)) {
      continue;
    }
    cache.set(url, { endUrl, pageTitle, articleTitle });
  }

  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} malformed cache row(s)`);
  }
  return cache;
}

/**
 * Loads the previous output at `path` as a cache. A missing or unreadable
 * file yields an empty cache.
 */
export async function loadCache(path: string, logger: Logger): Promise<UrlCache> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.info(`No previous output at ${path}; starting with an empty cache`);
    } else {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not read previous output ${path}: ${reason}`);
    }
    return new Map();
  }

  const cache = buildCache(text, logger);
  logger.info(`Loaded ${cache.size} cached record(s) from ${path}`);
  return cache;
}
