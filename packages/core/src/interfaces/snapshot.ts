/**
 * ISnapshotProvider: read-only namespace discovery contract.
 *
 * Returns the services of a namespace and their exposed ports, ordered by
 * service name. Fails with NamespaceNotFoundError or ConnectionError.
 */

import type { ServiceSnapshot } from './port-entry.js';

export interface ISnapshotProvider {
  readonly id: string;

  fetchNamespace(name: string): Promise<ServiceSnapshot[]>;
}
