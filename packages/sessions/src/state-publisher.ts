/**
 * StatePublisher: the single ordering point for the session table.
 *
 * The owner commits a complete table after each processed message. Readers
 * get frozen rows: `snapshot()` for polling, `subscribe()` for a stream that
 * starts with the full table and continues with whole changed rows.
 *
 * A subscriber holds at most one unread event: commits made while it is
 * behind are folded into what it has not read yet, so memory stays bounded
 * by the table size however slowly it reads.
 */

import type { SessionRow, StateEvent, StateSnapshot } from '@portshift/core';
import { Mailbox } from './mailbox.js';

export interface SubscribeOptions {
  /** Ends the subscription when aborted. */
  signal?: AbortSignal;
}

export class StatePublisher {
  private rows: readonly SessionRow[];
  private byRef: Map<string, SessionRow>;
  private version = 0;
  private closed = false;
  private readonly subscribers = new Set<Mailbox<StateEvent>>();

  constructor(initialRows: readonly SessionRow[] = []) {
    this.rows = freezeRows(initialRows);
    this.byRef = indexRows(this.rows);
  }

  snapshot(): StateSnapshot {
    return Object.freeze({ version: this.version, rows: this.rows });
  }

  /**
   * Replace the table. Returns the rows that changed; nothing is published
   * (and the version stays) when none did.
   */
  commit(rows: readonly SessionRow[]): readonly SessionRow[] {
    const next = freezeRows(rows);
    const changes = Object.freeze(next.filter((row) => !sameRow(this.byRef.get(row.ref), row)));
    if (changes.length === 0 && next.length === this.rows.length) {
      return changes;
    }

    this.version += 1;
    this.rows = next;
    this.byRef = indexRows(next);

    const event: StateEvent = { type: 'delta', version: this.version, changes };
    const current = this.rows;
    for (const subscriber of this.subscribers) {
      subscriber.postMerged(event, (queued, delta) => coalesce(queued, delta, current));
    }
    return changes;
  }

  /** Current table first, then deltas, until `return()`, abort or `close()`. */
  subscribe(options: SubscribeOptions = {}): AsyncIterableIterator<StateEvent> {
    const { signal } = options;
    const mailbox = new Mailbox<StateEvent>();
    mailbox.post({ type: 'snapshot', version: this.version, rows: this.rows });

    const detach = (): void => {
      this.subscribers.delete(mailbox);
      mailbox.drain();
      mailbox.close();
      signal?.removeEventListener('abort', detach);
    };

    if (this.closed) {
      mailbox.close();
    } else if (signal?.aborted) {
      detach();
    } else {
      this.subscribers.add(mailbox);
      signal?.addEventListener('abort', detach, { once: true });
    }

    return {
      next: () => mailbox.next(),
      return: async () => {
        detach();
        return { value: undefined, done: true };
      },
      [Symbol.asyncIterator]() {
        return this;
      },
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * End every subscription; later subscribers get the final table and then
   * end. Commits still update `snapshot()`.
   */
  close(): void {
    this.closed = true;
    for (const subscriber of this.subscribers) {
      subscriber.close();
    }
    this.subscribers.clear();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Fold a newer event into an unread one; the newer row for a ref wins. */
function coalesce(queued: StateEvent, next: StateEvent, current: readonly SessionRow[]): StateEvent {
  if (next.type === 'snapshot' || queued.type === 'snapshot') {
    return { type: 'snapshot', version: next.version, rows: current };
  }
  const merged = indexRows(queued.changes);
  for (const row of next.changes) {
    merged.set(row.ref, row);
  }
  return { type: 'delta', version: next.version, changes: Object.freeze([...merged.values()]) };
}

function freezeRows(rows: readonly SessionRow[]): readonly SessionRow[] {
  return Object.freeze(rows.map((row) => (Object.isFrozen(row) ? row : Object.freeze({ ...row }))));
}

function indexRows(rows: readonly SessionRow[]): Map<string, SessionRow> {
  return new Map(rows.map((row) => [row.ref, row]));
}

function sameRow(a: SessionRow | undefined, b: SessionRow): boolean {
  if (!a) return false;
  return (
    a.status === b.status &&
    a.requested === b.requested &&
    a.localPort === b.localPort &&
    a.generation === b.generation &&
    (a.startedAt?.getTime() ?? null) === (b.startedAt?.getTime() ?? null) &&
    a.lastError === b.lastError &&
    a.target === b.target
  );
}
