import { vi } from 'vitest';
import type { IObserver } from '@portshift/core';
import { NamespaceNotFoundError } from '@portshift/core';
import { StaticSnapshotProvider } from './static-provider.js';
import { discover } from './discover.js';

function observer() {
  return {
    onDiscovery: vi.fn(),
    onTunnelTransition: vi.fn(),
    onRaceDiscard: vi.fn(),
    onError: vi.fn(),
  } satisfies IObserver;
}

describe('discover', () => {
  const provider = new StaticSnapshotProvider({
    shop: [
      {
        name: 'web',
        ports: [
          { remotePort: 443, label: 'https', protocol: 'TCP' },
          { remotePort: 80, label: 'http', protocol: 'TCP' },
        ],
      },
      {
        name: 'api',
        ports: [
          { remotePort: 8080, label: 'http', protocol: 'TCP' },
          { remotePort: 8080, label: 'dup', protocol: 'TCP' },
        ],
      },
    ],
  });

  it('returns the ordered catalogue', async () => {
    const entries = await discover(provider, 'shop', observer());

    expect(entries.map((e) => `${e.serviceName}:${e.remotePort}:${e.label}`)).toEqual([
      'api:8080:http',
      'web:80:http',
      'web:443:https',
    ]);
  });

  it('reports the discovery to the observer', async () => {
    const obs = observer();
    await discover(provider, 'shop', obs);

    expect(obs.onDiscovery).toHaveBeenCalledTimes(1);
    expect(obs.onDiscovery).toHaveBeenCalledWith(
      expect.objectContaining({ provider: 'static', namespace: 'shop', services: 2, ports: 3 }),
    );
  });

  it('reports and rethrows failures', async () => {
    const obs = observer();

    await expect(discover(provider, 'ghost', obs)).rejects.toBeInstanceOf(NamespaceNotFoundError);
    expect(obs.onDiscovery).not.toHaveBeenCalled();
    expect(obs.onError).toHaveBeenCalledWith(expect.any(NamespaceNotFoundError), {
      provider: 'static',
      namespace: 'ghost',
    });
  });
});
