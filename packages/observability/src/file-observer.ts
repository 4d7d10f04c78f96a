/**
 * FileObserver: appends observability events as JSON lines.
 *
 * Used while the terminal UI owns stdout. When the file grows past
 * `maxBytes` it is renamed to `<file>.1` (replacing any previous rotation)
 * and a fresh file is started.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import type {
  IObserver,
  DiscoveryEvent,
  TunnelTransitionEvent,
  RaceDiscardEvent,
} from '@portshift/core';

export interface FileObserverOptions {
  /** Default: ~/.portshift/logs/portshift.jsonl */
  filePath?: string;
  /** Rotation threshold in bytes. Default 10 MiB. */
  maxBytes?: number;
}

const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

export class FileObserver implements IObserver {
  readonly filePath: string;
  private readonly maxBytes: number;
  private dirReady = false;

  constructor(options: FileObserverOptions = {}) {
    this.filePath = options.filePath ?? join(homedir(), '.portshift', 'logs', 'portshift.jsonl');
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  }

  onDiscovery(event: DiscoveryEvent): void {
    this.write('discovery', { ...event });
  }

  onTunnelTransition(event: TunnelTransitionEvent): void {
    const { error, timestamp, ...rest } = event;
    this.write('tunnel_transition', {
      ...rest,
      timestamp: timestamp.toISOString(),
      ...(error ? { error: { name: error.name, message: error.message } } : {}),
    });
  }

  onRaceDiscard(event: RaceDiscardEvent): void {
    this.write('race_discard', { ...event, timestamp: event.timestamp.toISOString() });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', { name: error.name, message: error.message, context });
  }

  async flush(): Promise<void> {
    // Writes are synchronous.
  }

  // ---- internals ----------------------------------------------------------

  private write(type: string, data: Record<string, unknown>): void {
    this.ensureDir();
    this.rotateIfNeeded();
    const line = JSON.stringify({ ts: new Date().toISOString(), type, ...data });
    appendFileSync(this.filePath, `${line}\n`, 'utf8');
  }

  private ensureDir(): void {
    if (this.dirReady) return;
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.dirReady = true;
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    if (statSync(this.filePath).size < this.maxBytes) return;
    renameSync(this.filePath, `${this.filePath}.1`);
  }
}
