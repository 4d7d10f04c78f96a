/**
 * NoopObserver: silent observer that discards all events.
 */

import type {
  IObserver,
  DiscoveryEvent,
  TunnelTransitionEvent,
  RaceDiscardEvent,
} from '@portshift/core';

export class NoopObserver implements IObserver {
  onDiscovery(_event: DiscoveryEvent): void {
    // intentionally empty
  }

  onTunnelTransition(_event: TunnelTransitionEvent): void {
    // intentionally empty
  }

  onRaceDiscard(_event: RaceDiscardEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
