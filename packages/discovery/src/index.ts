/**
 * @portshift/discovery: snapshot providers and catalogue discovery.
 */

export { KubernetesSnapshotProvider } from './kubernetes-provider.js';
export type { KubernetesDiscoveryApi } from './kubernetes-provider.js';

export { StaticSnapshotProvider } from './static-provider.js';

export { loadKubeConfig, contextNamespace } from './kubeconfig.js';
export type { KubeConfigOptions } from './kubeconfig.js';

export { discover } from './discover.js';
