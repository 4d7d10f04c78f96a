/**
 * Session policy points.
 *
 * - bulkTieBreak: what "toggle all" does when as many ports are on as off
 * - retry: automatic restarts of a failed, still-requested tunnel
 * - preferRemotePort: try the remote port number as the local port
 */

export type BulkTieBreak = 'start' | 'stop';

export interface RetryPolicy {
  maxAttempts: number;       // restarts after a failure; 0 keeps `failed` sticky
  backoffBaseMs: number;     // base delay for exponential backoff
  backoffMaxMs: number;      // max delay cap
}

export interface SessionPolicy {
  bulkTieBreak: BulkTieBreak;
  preferRemotePort: boolean;
  retry: RetryPolicy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 0,
  backoffBaseMs: 1_000,
  backoffMaxMs: 30_000,
};

export const DEFAULT_SESSION_POLICY: SessionPolicy = {
  bulkTieBreak: 'start',
  preferRemotePort: true,
  retry: DEFAULT_RETRY_POLICY,
};

/**
 * Decide the target of a bulk toggle: turn everything on when fewer entries
 * are requested than not, off when more are, and follow `tieBreak` on a tie.
 */
export function bulkTarget(requested: number, total: number, tieBreak: BulkTieBreak): boolean {
  const off = total - requested;
  if (requested === off) return tieBreak === 'start';
  return requested < off;
}
