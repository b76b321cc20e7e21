/**
 * Parses a Retry-After header, either delta-seconds or an HTTP date.
 */
export const parseRetryAfterMs = (header: string | null, nowMs: number): number | undefined => {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (trimmed === "") return undefined;

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - nowMs);
};
