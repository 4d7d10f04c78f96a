/**
 * IObserver: observability contract
 *
 * Structured observability for discovery, tunnel lifecycle transitions,
 * discarded stale outcomes, and errors.
 */

import type { PortEntryRef } from './port-entry.js';
import type { TunnelStatus } from './session.js';

export interface DiscoveryEvent {
  provider: string;
  namespace: string;
  services: number;
  ports: number;
  duration: number;
}

export interface TunnelTransitionEvent {
  ref: PortEntryRef;
  generation: number;
  from: TunnelStatus;
  to: TunnelStatus;
  localPort: number | null;
  error?: Error;
  timestamp: Date;
}

export interface RaceDiscardEvent {
  ref: PortEntryRef;
  /** Generation carried by the discarded outcome. */
  generation: number;
  /** Generation the session is currently on. */
  currentGeneration: number;
  outcome: 'active' | 'stopped' | 'failed';
  timestamp: Date;
}

export interface IObserver {
  onDiscovery(event: DiscoveryEvent): void;
  onTunnelTransition(event: TunnelTransitionEvent): void;
  onRaceDiscard(event: RaceDiscardEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
