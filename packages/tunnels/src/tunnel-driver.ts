/**
 * TunnelDriver: one local TCP listener forwarding to one remote target.
 *
 * Each `start()` creates an independent run that resolves the target through
 * the transport, binds the local port, reports `active`, and then proxies
 * every accepted connection over a fresh transport stream. A run reports
 * exactly one terminal outcome: `stopped` after `cancel()`, or `failed` on
 * setup errors, listener errors, or remote stream errors.
 *
 * The driver never touches session state; it only calls the outcome
 * listener, tagged with the generation it was started with.
 */

import { createServer, type Server, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import type {
  DriverOutcome,
  ITunnelDriver,
  ITunnelTransport,
  OutcomeListener,
  TunnelHandle,
  TunnelStartRequest,
  TunnelTarget,
} from '@portshift/core';
import { SetupError, StreamError, portEntryRef, toError } from '@portshift/core';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface TunnelDriverOptions {
  /** Local address to bind. Default: '127.0.0.1'. */
  bindAddress?: string;
  /** Upper bound on target resolution. Default: 15 000 ms. */
  setupTimeoutMs?: number;
  /** Bind an ephemeral port when the requested one is taken. Default: true. */
  fallbackToEphemeral?: boolean;
}

const DEFAULT_OPTIONS: Required<TunnelDriverOptions> = {
  bindAddress: '127.0.0.1',
  setupTimeoutMs: 15_000,
  fallbackToEphemeral: true,
};

// ---------------------------------------------------------------------------
// TunnelDriver
// ---------------------------------------------------------------------------

export class TunnelDriver<TTarget extends TunnelTarget = TunnelTarget> implements ITunnelDriver {
  private readonly options: Required<TunnelDriverOptions>;

  constructor(
    private readonly transport: ITunnelTransport<TTarget>,
    options: TunnelDriverOptions = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  start(request: TunnelStartRequest, onOutcome: OutcomeListener): TunnelHandle {
    const run = new TunnelRun(this.transport, this.options, request, onOutcome);
    run.begin();
    return run;
  }
}

// ---------------------------------------------------------------------------
// TunnelRun: a single driver instance
// ---------------------------------------------------------------------------

class TunnelRun<TTarget extends TunnelTarget> implements TunnelHandle {
  readonly generation: number;

  private readonly ref: string;
  private readonly controller = new AbortController();
  private readonly connections = new Set<Socket | Duplex>();
  private server: Server | null = null;
  private settled = false;

  constructor(
    private readonly transport: ITunnelTransport<TTarget>,
    private readonly options: Required<TunnelDriverOptions>,
    private readonly request: TunnelStartRequest,
    private readonly onOutcome: OutcomeListener,
  ) {
    this.generation = request.generation;
    this.ref = portEntryRef(request.entry);
  }

  // ── TunnelHandle ─────────────────────────────────────────────────────

  isAlive(): boolean {
    return !this.settled;
  }

  cancel(): void {
    if (this.settled) {
      this.teardown();
      return;
    }
    this.settled = true;
    this.teardown();
    this.report({ type: 'stopped' });
  }

  // ── Setup ────────────────────────────────────────────────────────────

  begin(): void {
    void this.setup().catch((err: unknown) => {
      const error = toError(err);
      this.fail(
        error instanceof SetupError
          ? error
          : new SetupError(error.message, this.ref, { cause: error.name }),
      );
    });
  }

  private async setup(): Promise<void> {
    const { signal } = this.controller;
    const { entry } = this.request;
    if (entry.protocol !== 'TCP') {
      throw new SetupError(`Only TCP ports can be forwarded, not ${entry.protocol}`, this.ref);
    }

    const target = await this.withSetupTimeout(this.transport.resolve(entry, signal));
    if (signal.aborted) return;

    const server = createServer((socket) => this.accept(socket, target));
    this.server = server;

    const localPort = await this.bind(server, this.request.localPort);
    if (signal.aborted) {
      // Cancelled while the bind was pending.
      server.close();
      return;
    }

    server.on('error', (err) => {
      this.fail(new StreamError(`Listener error: ${err.message}`, this.ref));
    });

    this.report({ type: 'active', localPort, target: target.description });
  }

  private async bind(server: Server, port: number): Promise<number> {
    try {
      return await this.listen(server, port);
    } catch (err) {
      if (port !== 0 && this.options.fallbackToEphemeral && isAddressInUse(err)) {
        server.close();
        return this.listen(server, 0);
      }
      const error = toError(err);
      throw new SetupError(
        `Cannot bind ${this.options.bindAddress}:${port}: ${error.message}`,
        this.ref,
        { localPort: port },
      );
    }
  }

  private listen(server: Server, port: number): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const onError = (err: Error) => {
        server.off('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        server.off('error', onError);
        const address = server.address();
        resolve(typeof address === 'object' && address !== null ? address.port : port);
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, this.options.bindAddress);
    });
  }

  private withSetupTimeout<T>(promise: Promise<T>): Promise<T> {
    const { signal } = this.controller;
    const ms = this.options.setupTimeoutMs;

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new SetupError(`Setup timed out after ${ms}ms`, this.ref));
      }, ms);

      const onAbort = () => {
        cleanup();
        reject(new SetupError('Setup cancelled', this.ref));
      };

      const cleanup = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
      };

      signal.addEventListener('abort', onAbort);
      promise.then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        },
      );
    });
  }

  // ── Forwarding ───────────────────────────────────────────────────────

  private accept(socket: Socket, target: TTarget): void {
    if (this.settled) {
      socket.destroy();
      return;
    }

    this.connections.add(socket);
    // Client-side resets end this connection only.
    socket.on('error', () => socket.destroy());
    socket.on('close', () => this.connections.delete(socket));

    this.transport.openStream(target, this.controller.signal).then(
      (remote) => this.splice(socket, remote),
      (err: unknown) => {
        socket.destroy();
        const error = toError(err);
        this.fail(
          error instanceof SetupError
            ? error
            : new SetupError(`Cannot open stream to ${target.description}: ${error.message}`, this.ref),
        );
      },
    );
  }

  private splice(socket: Socket, remote: Duplex): void {
    if (this.settled || socket.destroyed) {
      remote.destroy();
      socket.destroy();
      return;
    }

    this.connections.add(remote);

    remote.on('error', (err) => {
      socket.destroy();
      this.fail(new StreamError(`Stream to remote failed: ${err.message}`, this.ref));
    });
    remote.on('close', () => {
      this.connections.delete(remote);
      socket.destroy();
    });
    socket.on('close', () => remote.destroy());

    socket.pipe(remote);
    remote.pipe(socket);
  }

  // ── Teardown / reporting ─────────────────────────────────────────────

  private fail(error: Error): void {
    if (this.settled) return;
    this.settled = true;
    this.teardown();
    this.report({ type: 'failed', error });
  }

  private teardown(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
    if (this.server) {
      this.server.close();
      this.server = null;
    }
    for (const connection of this.connections) {
      connection.destroy();
    }
    this.connections.clear();
  }

  private report(outcome: DriverOutcome): void {
    this.onOutcome(this.generation, outcome);
  }
}

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE';
}
