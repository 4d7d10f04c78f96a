/**
 * KubernetesSnapshotProvider: reads the services of one namespace and the
 * ports each exposes. One read per call; nothing is cached or watched.
 */

import { CoreV1Api, type KubeConfig, type V1Namespace, type V1Service, type V1ServiceList } from '@kubernetes/client-node';
import type { ISnapshotProvider, PortProtocol, ServicePort, ServiceSnapshot } from '@portshift/core';
import { ConnectionError, NamespaceNotFoundError, toError } from '@portshift/core';

/** The slice of `CoreV1Api` discovery needs. */
export interface KubernetesDiscoveryApi {
  readNamespace(param: { name: string }): Promise<V1Namespace>;
  listNamespacedService(param: { namespace: string }): Promise<V1ServiceList>;
}

export class KubernetesSnapshotProvider implements ISnapshotProvider {
  readonly id = 'kubernetes';

  constructor(private readonly api: KubernetesDiscoveryApi) {}

  static fromKubeConfig(kubeConfig: KubeConfig): KubernetesSnapshotProvider {
    return new KubernetesSnapshotProvider(kubeConfig.makeApiClient(CoreV1Api));
  }

  async fetchNamespace(name: string): Promise<ServiceSnapshot[]> {
    try {
      await this.api.readNamespace({ name });
    } catch (err) {
      if (isNotFound(err)) {
        throw new NamespaceNotFoundError(name);
      }
      throw new ConnectionError(`Cannot reach the cluster: ${toError(err).message}`, name);
    }

    let list: V1ServiceList;
    try {
      list = await this.api.listNamespacedService({ namespace: name });
    } catch (err) {
      throw new ConnectionError(`Cannot list services: ${toError(err).message}`, name);
    }

    return list.items.flatMap((service) => {
      const snapshot = toSnapshot(service);
      return snapshot ? [snapshot] : [];
    });
  }
}

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

function toSnapshot(service: V1Service): ServiceSnapshot | null {
  const name = service.metadata?.name;
  if (!name) return null;

  const ports: ServicePort[] = (service.spec?.ports ?? []).map((port) => ({
    remotePort: port.port,
    label: port.name ?? String(port.port),
    protocol: toProtocol(port.protocol),
  }));

  return { name, ports };
}

function toProtocol(value: string | undefined): PortProtocol {
  switch (value) {
    case 'UDP':
      return 'UDP';
    case 'SCTP':
      return 'SCTP';
    default:
      return 'TCP';
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 404;
}
