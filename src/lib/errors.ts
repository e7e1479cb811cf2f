export class TitleGrabberError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'TitleGrabberError';
  }
}

/** A response with a non-success, non-redirect status. */
export class HttpStatusError extends TitleGrabberError {
  constructor(public readonly status: number, public readonly url: string) {
    super(`Request Failed. Status Code: ${status}`, 'HTTP_STATUS');
    this.name = 'HttpStatusError';
  }
}

/** A redirect that cannot be followed: no Location, a bad Location, or too many hops. */
export class RedirectError extends TitleGrabberError {
  constructor(message: string) {
    super(message, 'REDIRECT');
    this.name = 'RedirectError';
  }
}

export class InvalidUrlError extends TitleGrabberError {
  constructor(url: string) {
    super(`Invalid URL: ${url}`, 'INVALID_URL');
    this.name = 'InvalidUrlError';
  }
}

export class ExtractionError extends TitleGrabberError {
  constructor(message: string) {
    super(message, 'EXTRACTION');
    this.name = 'ExtractionError';
  }
}

export class ConfigError extends TitleGrabberError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Transport failures, timeouts and 5xx responses are worth another attempt.
 * Client errors and redirect problems are not.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status >= 500;
  }
  return !(error instanceof TitleGrabberError);
}

export function describeError(error: unknown): string {
  if (error instanceof HttpStatusError) {
    return String(error.status);
  }
  if (error instanceof Error) {
    // undici reports the socket-level reason (ECONNREFUSED, timeouts) as the cause
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}
