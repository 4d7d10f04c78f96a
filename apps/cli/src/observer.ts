/**
 * Observer wiring for a CLI run.
 *
 * The sinks named in `observability.observers` are always wrapped in a
 * MultiObserver: a sink that throws (an unwritable log directory, say) is
 * counted in `LogFailures` and never reaches discovery or the session loop.
 */

import type { IObserver } from '@portshift/core';
import { toError } from '@portshift/core';
import { ConsoleObserver, FileObserver, MultiObserver } from '@portshift/observability';
import type { PortshiftConfig } from './config.js';

export const OBSERVER_NAMES = ['console', 'file', 'noop'] as const;
export type ObserverName = (typeof OBSERVER_NAMES)[number];

export type ObserverSettings = PortshiftConfig['observability'];

/** What the sinks dropped during a run. */
export class LogFailures {
  count = 0;
  first: Error | null = null;

  readonly record = (error: unknown): void => {
    this.count += 1;
    if (!this.first) this.first = toError(error);
  };

  /** One line for stderr, or null when every event was written. */
  summary(): string | null {
    if (!this.first) return null;
    return `Logging failed for ${this.count} event(s): ${this.first.message}`;
  }
}

export function createObserver(settings: ObserverSettings, failures = new LogFailures()): MultiObserver {
  const sinks: IObserver[] = [];
  for (const name of new Set(settings.observers)) {
    const sink = createSink(name, settings);
    if (sink) sinks.push(sink);
  }
  return new MultiObserver(sinks, failures.record);
}

function createSink(name: ObserverName, settings: ObserverSettings): IObserver | null {
  switch (name) {
    case 'console':
      return new ConsoleObserver(settings.logLevel);
    case 'file':
      return new FileObserver({ filePath: settings.logPath, maxBytes: settings.maxLogSize });
    case 'noop':
      return null;
  }
}
