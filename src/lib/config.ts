import * as os from 'os';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_OUTPUT_PATH = 'out.csv';
export const DEFAULT_LOG_PATH = 'title-grabber.log';
export const CONNECT_TIMEOUT = 10; // seconds
export const READ_TIMEOUT = 15; // seconds
export const MAX_REDIRECTS = 5;
export const MAX_RETRIES = 3;
export const MAX_THREADS = os.availableParallelism();

const TRUE_VALUES = ['1', 't', 'true', 'True', 'TRUE'];

export const GrabberConfigSchema = z.object({
  connectTimeout: z.coerce.number().positive(),
  readTimeout: z.coerce.number().positive(),
  maxRedirects: z.coerce.number().int().nonnegative(),
  maxRetries: z.coerce.number().int().nonnegative(),
  maxThreads: z.coerce.number().int().positive(),
  inputPaths: z.array(z.string().min(1)).min(1, 'At least 1 input file is required'),
  outputPath: z.string().min(1),
  debug: z.boolean(),
});

export type GrabberConfig = Readonly<z.infer<typeof GrabberConfigSchema>>;

/** Config values as they arrive from the command line or the environment. */
export type RawGrabberConfig = {
  [K in keyof GrabberConfig]?: GrabberConfig[K] extends number ? number | string : GrabberConfig[K];
};

export function parseBooleanFlag(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.includes(value);
}

/**
 * Fills in defaults and validates. Every invalid field is reported in one
 * `ConfigError`.
 */
export function buildConfig(raw: RawGrabberConfig): GrabberConfig {
  const result = GrabberConfigSchema.safeParse({
    connectTimeout: raw.connectTimeout ?? CONNECT_TIMEOUT,
    readTimeout: raw.readTimeout ?? READ_TIMEOUT,
    maxRedirects: raw.maxRedirects ?? MAX_REDIRECTS,
    maxRetries: raw.maxRetries ?? MAX_RETRIES,
    maxThreads: raw.maxThreads ?? MAX_THREADS,
    inputPaths: raw.inputPaths ?? [],
    outputPath: raw.outputPath ?? DEFAULT_OUTPUT_PATH,
    debug: raw.debug ?? false,
  });
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return Object.freeze(result.data);
}
