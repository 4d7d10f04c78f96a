/**
 * @portshift/core: shared contracts, domain types and errors.
 */

export type {
  PortProtocol,
  ServicePort,
  ServiceSnapshot,
  PortEntry,
  PortEntryRef,
} from './interfaces/port-entry.js';
export { portEntryRef, comparePortEntries, buildCatalogue } from './interfaces/port-entry.js';

export type { ISnapshotProvider } from './interfaces/snapshot.js';

export type {
  TunnelTarget,
  ITunnelTransport,
  DriverOutcome,
  TunnelStartRequest,
  OutcomeListener,
  TunnelHandle,
  ITunnelDriver,
} from './interfaces/tunnel.js';

export type { TunnelStatus, SessionRow, StateSnapshot, StateEvent } from './interfaces/session.js';

export type {
  DiscoveryEvent,
  TunnelTransitionEvent,
  RaceDiscardEvent,
  IObserver,
} from './interfaces/observer.js';

export {
  PortshiftError,
  DiscoveryError,
  NamespaceNotFoundError,
  ConnectionError,
  SetupError,
  StreamError,
  ConfigError,
  toError,
} from './errors/index.js';

export { backoffDelay } from './utils/backoff.js';
