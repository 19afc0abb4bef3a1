type HeaderLookup = (name: string) => string | null | undefined;

/**
 * Reads the server-indicated delay from `retry-after-ms` or `retry-after`
 * (seconds or an HTTP date). Returns null when neither header is usable.
 */
export function parseRetryAfter(getHeader: HeaderLookup, now = Date.now()): number | null {
  const retryAfterMs = getHeader('retry-after-ms')?.trim();
  if (retryAfterMs) {
    const ms = Number(retryAfterMs);
    if (Number.isFinite(ms) && ms >= 0) return Math.floor(ms);
  }

  const retryAfter = getHeader('retry-after')?.trim();
  if (!retryAfter) return null;

  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.floor(seconds * 1000);

  const date = Date.parse(retryAfter);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return null;
}
