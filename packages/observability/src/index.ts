/**
 * @portshift/observability: structured observability for portshift.
 *
 * Re-exports every observer implementation.
 */

export { ConsoleObserver, LOG_LEVELS } from './console-observer.js';
export type { LogLevel } from './console-observer.js';

export { FileObserver } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';

export { MultiObserver } from './multi-observer.js';
export type { ChildErrorHandler } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';
