/**
 * ConsoleObserver: structured console logging with ANSI color coding.
 *
 * Formats observability events as human-readable console output, respecting
 * the configured log level. Tunnel transitions are colored by target status;
 * failures go to stderr with the error message.
 */

import type {
  IObserver,
  DiscoveryEvent,
  TunnelTransitionEvent,
  RaceDiscardEvent,
  TunnelStatus,
} from '@portshift/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Transition styling
// ---------------------------------------------------------------------------

const STATUS_COLOR: Record<TunnelStatus, string> = {
  idle: FG.gray,
  connecting: FG.yellow,
  active: FG.green,
  stopped: FG.gray,
  failed: FG.red,
};

/** Level at which a transition into the given status is logged. */
const STATUS_LEVEL: Record<TunnelStatus, LogLevel> = {
  idle: 'debug',
  connecting: 'debug',
  active: 'info',
  stopped: 'info',
  failed: 'error',
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  // ---- IObserver ----------------------------------------------------------

  onDiscovery(event: DiscoveryEvent): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('DISCOVERY', FG.cyan)} ${BOLD}${event.namespace}${RESET}` +
        ` ${DIM}provider=${RESET}${event.provider}` +
        ` ${DIM}services=${RESET}${event.services}` +
        ` ${DIM}ports=${RESET}${event.ports}` +
        ` ${DIM}duration=${RESET}${this.formatDuration(event.duration)}`,
    );
  }

  onTunnelTransition(event: TunnelTransitionEvent): void {
    const level = STATUS_LEVEL[event.to];
    if (!this.shouldLog(level)) return;

    const line =
      `${DIM}${this.timestamp()}${RESET} ${this.tag('TUNNEL', FG.magenta)} ${BOLD}${event.ref}${RESET}` +
      ` ${DIM}${event.from} ->${RESET} ${STATUS_COLOR[event.to]}${event.to}${RESET}` +
      ` ${DIM}gen=${RESET}${event.generation}` +
      (event.localPort !== null ? ` ${DIM}local=${RESET}${event.localPort}` : '') +
      (event.error ? ` ${DIM}error=${RESET}${event.error.message}` : '');

    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  onRaceDiscard(event: RaceDiscardEvent): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('DISCARD', FG.gray)} ${event.ref}` +
        ` ${DIM}outcome=${RESET}${event.outcome}` +
        ` ${DIM}gen=${RESET}${event.generation}` +
        ` ${DIM}current=${RESET}${event.currentGeneration}`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
