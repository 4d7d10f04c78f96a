/**
 * MultiObserver: fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and handed to `onChildError` (stderr by
 * default), so one broken observer never reaches the caller.
 */

import type {
  IObserver,
  DiscoveryEvent,
  TunnelTransitionEvent,
  RaceDiscardEvent,
} from '@portshift/core';

export type ChildErrorHandler = (error: unknown, phase: 'event' | 'flush') => void;

function logChildError(error: unknown, phase: 'event' | 'flush'): void {
  if (phase === 'flush') {
    console.error('[MultiObserver] flush error in child observer:', error);
  } else {
    console.error('[MultiObserver] child observer threw:', error);
  }
}

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];
  private readonly onChildError: ChildErrorHandler;

  constructor(children: IObserver[], onChildError: ChildErrorHandler = logChildError) {
    this.children = [...children];
    this.onChildError = onChildError;
  }

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        this.onChildError(err, 'event');
      }
    }
  }

  onDiscovery(event: DiscoveryEvent): void {
    this.safely((c) => c.onDiscovery(event));
  }

  onTunnelTransition(event: TunnelTransitionEvent): void {
    this.safely((c) => c.onTunnelTransition(event));
  }

  onRaceDiscard(event: RaceDiscardEvent): void {
    this.safely((c) => c.onRaceDiscard(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        this.onChildError(err, 'flush');
      }
    });
    await Promise.all(results);
  }
}
