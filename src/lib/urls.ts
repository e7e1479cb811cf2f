/** `http` or `https` followed by everything up to the next whitespace. */
const URL_REGEX = /https?:\/\/\S+/;

const FULL_URL_REGEX = /^https?:\/\//i;

const STATUS_PATH_REGEX = /\/status\/\d+$/;

/**
 * Returns the first URL-shaped substring of a line, or `null`.
 * Only the first match counts; later URLs on the same line are ignored.
 */
export function findFirstUrl(line: string): string | null {
  const match = URL_REGEX.exec(line);
  return match ? match[0] : null;
}

export function isFullUrl(candidate: string): boolean {
  return FULL_URL_REGEX.test(candidate);
}

/** Parses `input` (optionally against `base`), returning `null` instead of throwing. */
export function parseUrl(input: string, base?: string): URL | null {
  try {
    return new URL(input, base);
  } catch {
    return null;
  }
}

/** Whether a path ends in `/status/<digits>`. */
export function isStatusPath(pathname: string): boolean {
  return STATUS_PATH_REGEX.test(pathname);
}
