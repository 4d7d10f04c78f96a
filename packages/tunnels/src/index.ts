/**
 * @portshift/tunnels: the tunnel driver and its transports.
 *
 * The driver owns a local listener and proxies connections; a transport
 * resolves where they go and opens the byte streams.
 */

export { TunnelDriver } from './tunnel-driver.js';
export type { TunnelDriverOptions } from './tunnel-driver.js';

export { KubernetesTransport, resolveContainerPort } from './kubernetes-transport.js';
export type {
  KubernetesCoreApi,
  PortForwarder,
  ClosableSocket,
  KubernetesTarget,
} from './kubernetes-transport.js';
