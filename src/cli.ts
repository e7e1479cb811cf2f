#!/usr/bin/env node

/**
 * @module Main
 * This is the main entry point for the title-grabber CLI application.
 * It reads URLs from the files given as arguments, fetches their titles,
 * and merges the results into a CSV file that is reused as a cache on the
 * next run.
 *
 * Usage:
 *   title-grabber urls.txt                 - Write titles to out.csv
 *   title-grabber -o titles.csv a.txt b.txt
 *   title-grabber -d -t 8 -r 5 urls.txt    - Log to stderr, 8 workers, 5 retries
 */

import { createWriteStream } from 'fs';
import { Command, Option } from 'commander';
import {
  CONNECT_TIMEOUT,
  DEFAULT_LOG_PATH,
  DEFAULT_OUTPUT_PATH,
  MAX_REDIRECTS,
  MAX_RETRIES,
  MAX_THREADS,
  READ_TIMEOUT,
  buildConfig,
  parseBooleanFlag,
} from './lib/config.js';
import { grabTitles } from './lib/grabTitles.js';
import { createLogger } from './lib/logger.js';

interface CliOptions {
  output: string;
  connectTimeout: string;
  readTimeout: string;
  maxRedirects: string;
  maxRetries: string;
  maxThreads: string;
  debug?: boolean;
}

const program = new Command();

program
  .name('title-grabber')
  .description('Grabs page & article titles from lists of URLs contained in files passed in as arguments')
  .version('0.1.0')
  .argument('<files...>', '1 or more files containing URLs (1 per line)')
  .addOption(
    new Option('-o, --output <path>', 'Output CSV file').env('OUTPUT').default(DEFAULT_OUTPUT_PATH)
  )
  .addOption(
    new Option('--connect-timeout <seconds>', 'HTTP connect timeout')
      .env('CONNECT_TIMEOUT')
      .default(String(CONNECT_TIMEOUT))
  )
  .addOption(
    new Option('--read-timeout <seconds>', 'HTTP read timeout')
      .env('READ_TIMEOUT')
      .default(String(READ_TIMEOUT))
  )
  .addOption(
    new Option('--max-redirects <count>', 'Max. # of HTTP redirects to follow')
      .env('MAX_REDIRECTS')
      .default(String(MAX_REDIRECTS))
  )
  .addOption(
    new Option('-r, --max-retries <count>', 'Max. # of times to retry failed HTTP requests')
      .env('MAX_RETRIES')
      .default(String(MAX_RETRIES))
  )
  .addOption(
    new Option('-t, --max-threads <count>', 'Max. # of URLs to process concurrently')
      .env('MAX_THREADS')
      .default(String(MAX_THREADS))
  )
  .option('-d, --debug', `Log to stderr instead of to ${DEFAULT_LOG_PATH} in the CWD (or set DEBUG)`)
  .action(async (files: string[], options: CliOptions) => {
    const config = buildConfig({
      inputPaths: files,
      outputPath: options.output,
      connectTimeout: options.connectTimeout,
      readTimeout: options.readTimeout,
      maxRedirects: options.maxRedirects,
      maxRetries: options.maxRetries,
      maxThreads: options.maxThreads,
      debug: options.debug === true || parseBooleanFlag(process.env.DEBUG),
    });

    const logFile = config.debug ? null : createWriteStream(DEFAULT_LOG_PATH, { flags: 'a' });
    const logger = createLogger({ debug: config.debug, sink: logFile ?? process.stderr });

    try {
      const stats = await grabTitles(config, logger);
      process.stderr.write(
        `Done: ${stats.cached} cached, ${stats.fetched} fetched, ${stats.failed} failed -> ${config.outputPath}\n`
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(reason);
      throw error;
    } finally {
      logFile?.end();
    }
  });

// Conditionally load .env file in non-production environments
if (process.env.NODE_ENV !== 'production') {
  await import('dotenv/config');
}

try {
  await program.parseAsync(process.argv);
} catch (error) {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
