import type { IObserver, ISnapshotProvider, PortEntry } from '@portshift/core';
import { buildCatalogue, toError } from '@portshift/core';

/**
 * Fetch one namespace and turn it into the ordered, de-duplicated port
 * catalogue. Failures are reported to the observer and rethrown.
 */
export async function discover(
  provider: ISnapshotProvider,
  namespace: string,
  observer: IObserver,
): Promise<readonly PortEntry[]> {
  const started = Date.now();
  try {
    const services = await provider.fetchNamespace(namespace);
    const entries = buildCatalogue(services);
    observer.onDiscovery({
      provider: provider.id,
      namespace,
      services: services.length,
      ports: entries.length,
      duration: Date.now() - started,
    });
    return entries;
  } catch (err) {
    const error = toError(err);
    observer.onError(error, { provider: provider.id, namespace });
    throw error;
  }
}
