/**
 * KubernetesTransport: resolves a service port to a running pod and opens
 * port-forward streams to it through the API server.
 *
 * Pods are found through the service's label selector. Services without a
 * selector fall back to pods whose name starts with the service name.
 */

import { Duplex, PassThrough, Writable, type Readable } from 'node:stream';
import { CoreV1Api, PortForward, type KubeConfig, type V1Pod, type V1PodList, type V1Service, type V1ServicePort } from '@kubernetes/client-node';
import type { ITunnelTransport, PortEntry, TunnelTarget } from '@portshift/core';
import { SetupError, StreamError, portEntryRef, toError } from '@portshift/core';

// ---------------------------------------------------------------------------
// API seams
// ---------------------------------------------------------------------------

/** The slice of `CoreV1Api` the transport needs. */
export interface KubernetesCoreApi {
  readNamespacedService(param: { name: string; namespace: string }): Promise<V1Service>;
  listNamespacedPod(param: { namespace: string; labelSelector?: string }): Promise<V1PodList>;
}

export interface ClosableSocket {
  close(): void;
}

/** The slice of `PortForward` the transport needs. */
export interface PortForwarder {
  portForward(
    namespace: string,
    podName: string,
    targetPorts: number[],
    output: Writable,
    err: Writable | null,
    input: Readable,
  ): Promise<ClosableSocket | (() => ClosableSocket | null)>;
}

export interface KubernetesTarget extends TunnelTarget {
  readonly ref: string;
  readonly namespace: string;
  readonly podName: string;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class KubernetesTransport implements ITunnelTransport<KubernetesTarget> {
  readonly id = 'kubernetes';

  constructor(
    private readonly api: KubernetesCoreApi,
    private readonly forwarder: PortForwarder,
    private readonly namespace: string,
  ) {}

  static fromKubeConfig(kubeConfig: KubeConfig, namespace: string): KubernetesTransport {
    return new KubernetesTransport(kubeConfig.makeApiClient(CoreV1Api), new PortForward(kubeConfig), namespace);
  }

  async resolve(entry: PortEntry, signal: AbortSignal): Promise<KubernetesTarget> {
    const ref = portEntryRef(entry);
    const { namespace } = this;

    const service = await this.call(ref, `Cannot read service "${entry.serviceName}"`, () =>
      this.api.readNamespacedService({ name: entry.serviceName, namespace }),
    );
    const servicePort = (service.spec?.ports ?? []).find(
      (p) => p.port === entry.remotePort && (p.protocol ?? 'TCP') === entry.protocol,
    );
    if (!servicePort) {
      throw new SetupError(
        `Service "${entry.serviceName}" no longer exposes ${entry.remotePort}/${entry.protocol}`,
        ref,
      );
    }
    throwIfCancelled(signal, ref);

    const pod = await this.findRunningPod(service, entry.serviceName, ref);
    throwIfCancelled(signal, ref);

    const podName = pod.metadata?.name ?? '';
    const containerPort = resolveContainerPort(servicePort, pod, ref);

    return {
      ref,
      namespace,
      podName,
      remotePort: containerPort,
      description: `pod/${podName}:${containerPort}`,
    };
  }

  async openStream(target: KubernetesTarget, signal: AbortSignal): Promise<Duplex> {
    const toRemote = new PassThrough();
    const fromRemote = new PassThrough();
    const stream = Duplex.from({ readable: fromRemote, writable: toRemote });

    // The error channel carries text from the kubelet; any of it ends the stream.
    const errors = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        const message = chunk.toString('utf8').trim();
        if (message.length > 0) {
          stream.destroy(new StreamError(message, target.ref, { pod: target.podName }));
        }
        callback();
      },
    });

    const socket = await this.call(target.ref, `Cannot forward to ${target.description}`, () =>
      this.forwarder.portForward(
        target.namespace,
        target.podName,
        [target.remotePort],
        fromRemote,
        errors,
        toRemote,
      ),
    );

    const close = () => {
      const ws = typeof socket === 'function' ? socket() : socket;
      ws?.close();
    };

    if (signal.aborted) {
      close();
      stream.destroy();
      throw new SetupError('Setup cancelled', target.ref);
    }

    stream.once('close', close);
    return stream;
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private async findRunningPod(service: V1Service, serviceName: string, ref: string): Promise<V1Pod> {
    const { namespace } = this;
    const selector = service.spec?.selector ?? {};
    const labelSelector = Object.entries(selector)
      .map(([key, value]) => `${key}=${value}`)
      .join(',');

    const pods =
      labelSelector.length > 0
        ? await this.call(ref, 'Cannot list pods', () => this.api.listNamespacedPod({ namespace, labelSelector }))
        : await this.call(ref, 'Cannot list pods', () => this.api.listNamespacedPod({ namespace }));

    const candidates =
      labelSelector.length > 0
        ? pods.items
        : pods.items.filter((pod) => (pod.metadata?.name ?? '').startsWith(serviceName));

    const running = candidates.find(
      (pod) => pod.status?.phase === 'Running' && pod.metadata?.deletionTimestamp === undefined,
    );
    if (!running?.metadata?.name) {
      throw new SetupError(`No running pod for service "${serviceName}"`, ref, { namespace });
    }
    return running;
  }

  private async call<T>(ref: string, prefix: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const error = toError(err);
      throw new SetupError(`${prefix}: ${error.message}`, ref, { namespace: this.namespace });
    }
  }
}

// ---------------------------------------------------------------------------
// Port mapping
// ---------------------------------------------------------------------------

/**
 * Map a service port onto the pod's container port. `targetPort` may be
 * absent (same as `port`), a number, or the name of a container port.
 */
export function resolveContainerPort(servicePort: V1ServicePort, pod: V1Pod, ref: string): number {
  const target = servicePort.targetPort;
  if (target === undefined) return servicePort.port;
  if (typeof target === 'number') return target;
  if (/^\d+$/.test(target)) return Number(target);

  const protocol = servicePort.protocol ?? 'TCP';
  for (const container of pod.spec?.containers ?? []) {
    const match = (container.ports ?? []).find(
      (p) => p.name === target && (p.protocol ?? 'TCP') === protocol,
    );
    if (match) return match.containerPort;
  }

  throw new SetupError(`Pod "${pod.metadata?.name ?? ''}" has no container port named "${target}"`, ref);
}

function throwIfCancelled(signal: AbortSignal, ref: string): void {
  if (signal.aborted) {
    throw new SetupError('Setup cancelled', ref);
  }
}
