/**
 * Exponential backoff with full jitter.
 *
 * attempt 0 -> [base/2, base], attempt n -> [d/2, d] with d = min(max, base * 2^n).
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const exp = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt));
  const half = exp / 2;
  return Math.round(half + random() * half);
}
