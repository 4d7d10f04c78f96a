/**
 * SessionManager: owns the desired and actual state of every port entry.
 *
 * All mutation happens on one control loop that consumes a mailbox. Public
 * operations only enqueue: toggles from the presentation layer and outcomes
 * from tunnel drivers are both messages, processed one at a time in arrival
 * order, and each processed message ends with a commit to the publisher.
 *
 * Every driver start bumps the entry's generation. An outcome is applied only
 * when it carries the current generation of a driver the manager still holds;
 * anything else is a race discard.
 */

import type {
  DriverOutcome,
  IObserver,
  ITunnelDriver,
  PortEntry,
  PortEntryRef,
  SessionRow,
  StateEvent,
  StateSnapshot,
  TunnelHandle,
  TunnelStatus,
} from '@portshift/core';
import { PortshiftError, backoffDelay, comparePortEntries, portEntryRef, toError } from '@portshift/core';
import { MultiObserver, NoopObserver } from '@portshift/observability';
import { Mailbox } from './mailbox.js';
import { StatePublisher, type SubscribeOptions } from './state-publisher.js';
import {
  DEFAULT_SESSION_POLICY,
  bulkTarget,
  type RetryPolicy,
  type SessionPolicy,
} from './policies.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface SessionManagerOptions {
  driver: ITunnelDriver;
  entries: readonly PortEntry[];
  observer?: IObserver;
  policy?: Partial<Omit<SessionPolicy, 'retry'>> & { retry?: Partial<RetryPolicy> };
  /** Clock for `startedAt`. Default: `() => new Date()`. */
  now?: () => Date;
}

export interface PortEntryStatus {
  entry: PortEntry;
  status: TunnelStatus;
}

type Message =
  | { type: 'toggle'; ref: PortEntryRef }
  | { type: 'toggle_service'; serviceName: string }
  | { type: 'outcome'; ref: PortEntryRef; generation: number; outcome: DriverOutcome }
  | { type: 'retry'; ref: PortEntryRef; generation: number }
  | { type: 'shutdown' };

interface Session {
  readonly ref: PortEntryRef;
  readonly entry: PortEntry;
  status: TunnelStatus;
  requested: boolean;
  generation: number;
  handle: TunnelHandle | null;
  localPort: number | null;
  startedAt: Date | null;
  lastError: string | null;
  target: string | null;
  failures: number;
  retryTimer: ReturnType<typeof setTimeout> | null;
}

export class UnknownEntryError extends PortshiftError {
  constructor(subject: string) {
    super(`Unknown port entry or service "${subject}"`, 'UNKNOWN_ENTRY', { subject });
    this.name = 'UnknownEntryError';
  }
}

// ── SessionManager ───────────────────────────────────────────────────────

export class SessionManager {
  private readonly driver: ITunnelDriver;
  private readonly observer: IObserver;
  private readonly policy: SessionPolicy;
  private readonly now: () => Date;

  private readonly sessions = new Map<PortEntryRef, Session>();
  private readonly order: readonly Session[];
  private readonly publisher: StatePublisher;
  private readonly mailbox = new Mailbox<Message>();

  private loop: Promise<void> | null = null;
  private pending = 0;
  private failedReports = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: SessionManagerOptions) {
    this.driver = options.driver;
    // A throwing observer must not stop the loop or escape a command.
    this.observer = new MultiObserver([options.observer ?? new NoopObserver()], () => {
      this.failedReports += 1;
    });
    this.now = options.now ?? (() => new Date());
    this.policy = {
      ...DEFAULT_SESSION_POLICY,
      ...options.policy,
      retry: { ...DEFAULT_SESSION_POLICY.retry, ...options.policy?.retry },
    };

    const sorted = [...options.entries].sort(comparePortEntries);
    for (const entry of sorted) {
      const ref = portEntryRef(entry);
      if (this.sessions.has(ref)) continue;
      this.sessions.set(ref, {
        ref,
        entry,
        status: 'idle',
        requested: false,
        generation: 0,
        handle: null,
        localPort: null,
        startedAt: null,
        lastError: null,
        target: null,
        failures: 0,
        retryTimer: null,
      });
    }
    this.order = [...this.sessions.values()];
    this.publisher = new StatePublisher(this.rows());
  }

  // ── Queries ──────────────────────────────────────────────────────────

  /** Ordered by service name, remote port, protocol. */
  listPortEntries(): PortEntryStatus[] {
    return this.publisher.snapshot().rows.map((row) => ({ entry: row.entry, status: row.status }));
  }

  snapshot(): StateSnapshot {
    return this.publisher.snapshot();
  }

  subscribe(options?: SubscribeOptions): AsyncIterableIterator<StateEvent> {
    return this.publisher.subscribe(options);
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.mailbox.isClosed;
  }

  /** Observer calls that threw and were dropped. */
  get observerFailures(): number {
    return this.failedReports;
  }

  // ── Commands ─────────────────────────────────────────────────────────

  /** Flip the desired state of one entry. Never throws. */
  toggle(ref: PortEntryRef): void {
    if (!this.sessions.has(ref)) {
      this.observer.onError(new UnknownEntryError(ref), { operation: 'toggle' });
      return;
    }
    this.post({ type: 'toggle', ref });
  }

  /**
   * Turn every port of a service on or off by majority of the current
   * desired state. Each entry is applied on its own. Never throws.
   */
  toggleAllForService(serviceName: string): void {
    if (!this.order.some((s) => s.entry.serviceName === serviceName)) {
      this.observer.onError(new UnknownEntryError(serviceName), { operation: 'toggleAllForService' });
      return;
    }
    this.post({ type: 'toggle_service', serviceName });
  }

  /** Intake for driver outcomes; safe to call at any time. */
  onDriverOutcome(ref: PortEntryRef, generation: number, outcome: DriverOutcome): void {
    this.post({ type: 'outcome', ref, generation, outcome });
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  /** Begin consuming the mailbox. Messages posted earlier are kept. */
  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /** Cancel every driver, process what is queued, and end the loop. */
  async stop(): Promise<void> {
    if (!this.loop) this.start();
    if (!this.mailbox.isClosed) {
      this.post({ type: 'shutdown' });
      this.mailbox.close();
    }
    await this.loop;
    this.publisher.close();
  }

  /**
   * Resolves once every message posted so far has been processed.
   *
   * Messages posted before `start()` are only processed by the loop, so the
   * promise stays pending until `start()` (or `stop()`) runs it. Once the
   * manager has stopped nothing is pending and it resolves at once.
   */
  whenIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  // ── Control loop ─────────────────────────────────────────────────────

  private post(message: Message): void {
    if (this.mailbox.post(message)) {
      this.pending += 1;
    }
  }

  private async run(): Promise<void> {
    for await (const message of this.mailbox) {
      try {
        this.process(message);
      } catch (err) {
        this.observer.onError(toError(err), { message: message.type });
      }
      this.publisher.commit(this.rows());

      this.pending -= 1;
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const wake of waiters) wake();
      }
    }
  }

  private process(message: Message): void {
    switch (message.type) {
      case 'toggle':
        return this.applyToggle(message.ref);
      case 'toggle_service':
        return this.applyServiceToggle(message.serviceName);
      case 'outcome':
        return this.applyOutcome(message.ref, message.generation, message.outcome);
      case 'retry':
        return this.applyRetry(message.ref, message.generation);
      case 'shutdown':
        return this.applyShutdown();
    }
  }

  // ── Message handlers ─────────────────────────────────────────────────

  private applyToggle(ref: PortEntryRef): void {
    const session = this.sessions.get(ref);
    if (!session) return;
    this.setRequested(session, !session.requested);
  }

  private applyServiceToggle(serviceName: string): void {
    const group = this.order.filter((s) => s.entry.serviceName === serviceName);
    const requested = group.filter((s) => s.requested).length;
    const target = bulkTarget(requested, group.length, this.policy.bulkTieBreak);

    for (const session of group) {
      if (session.requested === target) continue;
      try {
        this.setRequested(session, target);
      } catch (err) {
        this.markFailed(session, toError(err));
      }
    }
  }

  private applyOutcome(ref: PortEntryRef, generation: number, outcome: DriverOutcome): void {
    const session = this.sessions.get(ref);
    if (!session) return;

    const live = session.handle !== null && session.handle.generation === generation;
    if (!live && generation === session.generation && outcome.type === 'stopped') {
      // Acknowledgement of a cancel the manager issued itself.
      return;
    }
    if (!live || generation !== session.generation) {
      this.observer.onRaceDiscard({
        ref,
        generation,
        currentGeneration: session.generation,
        outcome: outcome.type,
        timestamp: this.now(),
      });
      return;
    }

    switch (outcome.type) {
      case 'active': {
        if (session.status !== 'connecting') return;
        const from = session.status;
        session.status = 'active';
        session.localPort = outcome.localPort;
        session.target = outcome.target;
        session.startedAt = this.now();
        session.failures = 0;
        this.transition(session, from);
        return;
      }
      case 'stopped': {
        const from = session.status;
        session.handle = null;
        session.requested = false;
        session.status = 'stopped';
        session.startedAt = null;
        this.transition(session, from);
        return;
      }
      case 'failed': {
        session.handle = null;
        this.markFailed(session, outcome.error);
        return;
      }
    }
  }

  private applyRetry(ref: PortEntryRef, generation: number): void {
    const session = this.sessions.get(ref);
    if (!session) return;
    session.retryTimer = null;
    if (
      session.generation !== generation ||
      !session.requested ||
      session.status !== 'failed' ||
      session.handle !== null
    ) {
      return;
    }
    this.startDriver(session);
  }

  private applyShutdown(): void {
    for (const session of this.order) {
      if (session.requested || session.handle || session.retryTimer) {
        session.requested = false;
        this.stopDriver(session);
      }
    }
  }

  // ── Driver management ────────────────────────────────────────────────

  private setRequested(session: Session, requested: boolean): void {
    session.requested = requested;
    session.failures = 0;
    if (requested) {
      this.startDriver(session);
    } else {
      this.stopDriver(session);
    }
  }

  private startDriver(session: Session): void {
    this.clearRetry(session);
    if (session.handle) {
      const superseded = session.handle;
      session.handle = null;
      superseded.cancel();
    }

    const from = session.status;
    session.generation += 1;
    session.status = 'connecting';
    session.lastError = null;
    session.target = null;
    session.startedAt = null;

    const localPort = this.chooseLocalPort(session);
    session.localPort = localPort === 0 ? null : localPort;
    this.transition(session, from);

    const { ref, generation } = session;
    try {
      session.handle = this.driver.start(
        { entry: session.entry, localPort, generation },
        (gen, outcome) => this.onDriverOutcome(ref, gen, outcome),
      );
    } catch (err) {
      this.markFailed(session, toError(err));
    }
  }

  private stopDriver(session: Session): void {
    this.clearRetry(session);
    const handle = session.handle;
    session.handle = null;
    handle?.cancel();

    const from = session.status;
    session.status = 'stopped';
    session.startedAt = null;
    session.target = null;
    this.transition(session, from);
  }

  private markFailed(session: Session, error: Error): void {
    const from = session.status;
    session.status = 'failed';
    session.lastError = error.message;
    session.startedAt = null;
    session.target = null;
    session.failures += 1;

    const { retry } = this.policy;
    if (session.requested && session.failures <= retry.maxAttempts) {
      const delay = backoffDelay(session.failures - 1, retry.backoffBaseMs, retry.backoffMaxMs);
      const { ref, generation } = session;
      session.retryTimer = setTimeout(() => this.post({ type: 'retry', ref, generation }), delay);
    } else {
      session.requested = false;
      session.failures = 0;
    }

    this.transition(session, from, error);
  }

  private clearRetry(session: Session): void {
    if (session.retryTimer) {
      clearTimeout(session.retryTimer);
      session.retryTimer = null;
    }
  }

  /**
   * Last-used port, then the remote port number, then 0 (OS-assigned),
   * skipping any port another live entry holds.
   */
  private chooseLocalPort(session: Session): number {
    const held = new Set<number>();
    for (const other of this.order) {
      if (other !== session && other.handle && other.localPort !== null) {
        held.add(other.localPort);
      }
    }

    const candidates = [session.localPort];
    if (this.policy.preferRemotePort) candidates.push(session.entry.remotePort);

    for (const port of candidates) {
      if (port !== null && port > 0 && !held.has(port)) return port;
    }
    return 0;
  }

  // ── Reporting ────────────────────────────────────────────────────────

  private transition(session: Session, from: TunnelStatus, error?: Error): void {
    this.observer.onTunnelTransition({
      ref: session.ref,
      generation: session.generation,
      from,
      to: session.status,
      localPort: session.localPort,
      error,
      timestamp: this.now(),
    });
  }

  private rows(): SessionRow[] {
    return this.order.map((s) => ({
      ref: s.ref,
      entry: s.entry,
      status: s.status,
      requested: s.requested,
      localPort: s.localPort,
      generation: s.generation,
      startedAt: s.startedAt,
      lastError: s.lastError,
      target: s.target,
    }));
  }
}
