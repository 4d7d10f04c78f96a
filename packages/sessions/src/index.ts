/**
 * @portshift/sessions: the session manager and its state publisher.
 */

export { SessionManager, UnknownEntryError } from './session-manager.js';
export type { SessionManagerOptions, PortEntryStatus } from './session-manager.js';

export { StatePublisher } from './state-publisher.js';
export type { SubscribeOptions } from './state-publisher.js';

export { Mailbox } from './mailbox.js';

export {
  DEFAULT_SESSION_POLICY,
  DEFAULT_RETRY_POLICY,
  bulkTarget,
} from './policies.js';
export type { BulkTieBreak, RetryPolicy, SessionPolicy } from './policies.js';
