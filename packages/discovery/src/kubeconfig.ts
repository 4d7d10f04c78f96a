/**
 * Kubeconfig loading. The default kubeconfig (KUBECONFIG or ~/.kube/config)
 * is used as-is; only the context can be overridden.
 */

import { KubeConfig } from '@kubernetes/client-node';
import { ConfigError, toError } from '@portshift/core';

export interface KubeConfigOptions {
  /** Explicit kubeconfig file. Default: the client's own lookup. */
  kubeconfig?: string;
  /** Context to switch to. Default: the file's current context. */
  context?: string;
}

export function loadKubeConfig(options: KubeConfigOptions = {}): KubeConfig {
  const kubeConfig = new KubeConfig();
  try {
    if (options.kubeconfig) {
      kubeConfig.loadFromFile(options.kubeconfig);
    } else {
      kubeConfig.loadFromDefault();
    }
  } catch (err) {
    throw new ConfigError(`Cannot load kubeconfig: ${toError(err).message}`, {
      path: options.kubeconfig,
    });
  }

  if (options.context) {
    const known = kubeConfig.getContexts().map((c) => c.name);
    if (!known.includes(options.context)) {
      throw new ConfigError(`Unknown kube context "${options.context}"`, { known });
    }
    kubeConfig.setCurrentContext(options.context);
  }

  return kubeConfig;
}

/** Namespace set on the current context, if any. */
export function contextNamespace(kubeConfig: KubeConfig): string | undefined {
  const current = kubeConfig.getContextObject(kubeConfig.getCurrentContext());
  return current?.namespace || undefined;
}
