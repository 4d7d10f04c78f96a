/**
 * Tunnel contracts: transport and driver.
 *
 * The transport knows how to reach a remote port through the cluster. The
 * driver owns one local listener for one PortEntry and reports its lifecycle
 * back through a single outcome callback; it never touches session state.
 */

import type { Duplex } from 'node:stream';
import type { PortEntry } from './port-entry.js';

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** A resolved remote endpoint, e.g. a pod and container port. */
export interface TunnelTarget {
  /** Human-readable target, e.g. `pod/api-7c9f:8080`. */
  readonly description: string;
  readonly remotePort: number;
}

export interface ITunnelTransport<TTarget extends TunnelTarget = TunnelTarget> {
  readonly id: string;

  /** Resolve the remote endpoint for an entry. Throws SetupError. */
  resolve(entry: PortEntry, signal: AbortSignal): Promise<TTarget>;

  /**
   * Open one byte stream to the target. Throws SetupError when the stream
   * cannot be established; errors emitted later on the stream are I/O errors.
   */
  openStream(target: TTarget, signal: AbortSignal): Promise<Duplex>;
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

export type DriverOutcome =
  | { type: 'active'; localPort: number; target: string }
  | { type: 'stopped' }
  | { type: 'failed'; error: Error };

export interface TunnelStartRequest {
  entry: PortEntry;
  /** Requested local port; 0 lets the OS choose. */
  localPort: number;
  generation: number;
}

export type OutcomeListener = (generation: number, outcome: DriverOutcome) => void;

export interface TunnelHandle {
  readonly generation: number;
  /**
   * Force teardown. When this returns the local listener is closed and no
   * further bytes are forwarded.
   */
  cancel(): void;
  isAlive(): boolean;
}

export interface ITunnelDriver {
  start(request: TunnelStartRequest, onOutcome: OutcomeListener): TunnelHandle;
}
