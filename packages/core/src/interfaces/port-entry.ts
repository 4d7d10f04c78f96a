/**
 * Port catalogue: the immutable view of a namespace taken at startup.
 *
 * A PortEntry is one exposed (service, remote port, protocol) triple. The
 * catalogue is built once from the snapshot provider and never refreshed.
 */

export type PortProtocol = 'TCP' | 'UDP' | 'SCTP';

export interface ServicePort {
  remotePort: number;
  /** Port name from the service spec, or the port number when unnamed. */
  label: string;
  protocol: PortProtocol;
}

export interface ServiceSnapshot {
  name: string;
  ports: ServicePort[];
}

export interface PortEntry {
  readonly serviceName: string;
  readonly remotePort: number;
  readonly protocol: PortProtocol;
  readonly label: string;
}

/** Stable string identity of a PortEntry: `service/port/protocol`. */
export type PortEntryRef = string;

export function portEntryRef(entry: Pick<PortEntry, 'serviceName' | 'remotePort' | 'protocol'>): PortEntryRef {
  return `${entry.serviceName}/${entry.remotePort}/${entry.protocol}`;
}

/** Orders by service name, then remote port, then protocol. */
export function comparePortEntries(a: PortEntry, b: PortEntry): number {
  if (a.serviceName !== b.serviceName) return a.serviceName < b.serviceName ? -1 : 1;
  if (a.remotePort !== b.remotePort) return a.remotePort - b.remotePort;
  if (a.protocol !== b.protocol) return a.protocol < b.protocol ? -1 : 1;
  return 0;
}

/**
 * Flatten a namespace snapshot into an ordered, de-duplicated catalogue of
 * frozen entries.
 */
export function buildCatalogue(services: readonly ServiceSnapshot[]): readonly PortEntry[] {
  const byRef = new Map<PortEntryRef, PortEntry>();

  for (const service of services) {
    for (const port of service.ports) {
      const entry: PortEntry = Object.freeze({
        serviceName: service.name,
        remotePort: port.remotePort,
        protocol: port.protocol,
        label: port.label,
      });
      const ref = portEntryRef(entry);
      if (!byRef.has(ref)) byRef.set(ref, entry);
    }
  }

  return Object.freeze([...byRef.values()].sort(comparePortEntries));
}
