/**
 * A value counts as present when it is neither null/undefined nor an empty
 * (or whitespace-only) string. Numbers, including 0, are present.
 */
function isPresent<T>(value: T | null | undefined): value is T {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim() !== '';
  return true;
}

/**
 * Returns the first present candidate, in argument order.
 *
 * Used wherever a field has several fallback sources in the payload, e.g.
 * `firstPresent(headCommit?.timestamp, repository?.pushed_at)`.
 */
export function firstPresent<T>(...candidates: ReadonlyArray<T | null | undefined>): T | undefined {
  for (const candidate of candidates) {
    if (isPresent(candidate)) return candidate;
  }
  return undefined;
}
