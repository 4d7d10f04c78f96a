/**
 * StaticSnapshotProvider: serves a fixed, in-memory topology. Used by
 * tests and for offline demos.
 */

import type { ISnapshotProvider, ServiceSnapshot } from '@portshift/core';
import { NamespaceNotFoundError } from '@portshift/core';

export class StaticSnapshotProvider implements ISnapshotProvider {
  readonly id = 'static';

  constructor(private readonly namespaces: Readonly<Record<string, readonly ServiceSnapshot[]>>) {}

  async fetchNamespace(name: string): Promise<ServiceSnapshot[]> {
    const services = Object.hasOwn(this.namespaces, name) ? this.namespaces[name] : undefined;
    if (!services) {
      throw new NamespaceNotFoundError(name);
    }
    return services.map((service) => ({ name: service.name, ports: [...service.ports] }));
  }
}
