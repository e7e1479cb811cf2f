export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export interface LoggerOptions {
  /** Lowers the threshold from `info` to `debug`. */
  debug: boolean;
  /** Where log lines are written, e.g. `process.stderr` or a file stream. */
  sink: { write(line: string): unknown };
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta = {},
  now: Date = new Date()
): string {
  const fields = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  const suffix = fields.length > 0 ? ` ${fields.join(' ')}` : '';
  return `${now.toISOString()} ${level.toUpperCase()} ${message}${suffix}\n`;
}

export const createLogger = ({ debug, sink }: LoggerOptions): Logger => {
  const threshold = levelWeights[debug ? 'debug' : 'info'];
  const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (levelWeights[level] >= threshold) {
      sink.write(formatLogLine(level, message, meta));
    }
  };
  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
};

const noop = () => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
