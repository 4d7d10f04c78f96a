/**
 * Session view: the rows the State Publisher hands to the presentation layer.
 */

import type { PortEntry, PortEntryRef } from './port-entry.js';

export type TunnelStatus = 'idle' | 'connecting' | 'active' | 'stopped' | 'failed';

export interface SessionRow {
  readonly ref: PortEntryRef;
  readonly entry: PortEntry;
  readonly status: TunnelStatus;
  /** Desired state: what the user last asked for. */
  readonly requested: boolean;
  /** Bound local port while active, otherwise the last used one. */
  readonly localPort: number | null;
  readonly generation: number;
  readonly startedAt: Date | null;
  readonly lastError: string | null;
  /** Remote endpoint description reported by the driver once active. */
  readonly target: string | null;
}

export interface StateSnapshot {
  readonly version: number;
  readonly rows: readonly SessionRow[];
}

export type StateEvent =
  | { type: 'snapshot'; version: number; rows: readonly SessionRow[] }
  | { type: 'delta'; version: number; changes: readonly SessionRow[] };
