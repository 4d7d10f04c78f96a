/**
 * portshift command line.
 *
 * Loads configuration, discovers the namespace once, then either prints the
 * port catalogue (`--list`) or runs the interactive view until the user
 * quits. `run()` never exits the process; it returns the exit code.
 */

import type { Writable } from 'node:stream';
import { Command, CommanderError } from 'commander';
import type { IObserver, ISnapshotProvider, ITunnelTransport, PortEntry } from '@portshift/core';
import { ConfigError, toError } from '@portshift/core';
import { KubernetesSnapshotProvider, contextNamespace, discover, loadKubeConfig } from '@portshift/discovery';
import { LOG_LEVELS, type LogLevel } from '@portshift/observability';
import { SessionManager } from '@portshift/sessions';
import { KubernetesTransport, TunnelDriver } from '@portshift/tunnels';
import { isValidNamespace, loadConfig, resolveNamespace, type PortshiftConfig } from './config.js';
import { formatCatalogue } from './list.js';
import { LogFailures, createObserver } from './observer.js';
import { runTui, type TuiInput, type TuiOutput } from './tui/app.js';
import { CROSS, WARN } from './ui.js';

export const VERSION = '0.1.0';

export type CliOptions = {
  namespace?: string;
  context?: string;
  config?: string;
  kubeconfig?: string;
  list?: boolean;
  logLevel?: string;
};

/** Everything the CLI needs from a cluster. */
export interface ClusterAccess {
  provider: ISnapshotProvider;
  /** Namespace of the selected kube context, if it sets one. */
  contextNamespace?: string;
  transport(namespace: string): ITunnelTransport;
}

export interface CliEnvironment {
  stdin: TuiInput;
  stdout: TuiOutput;
  stderr: Writable;
  /** Cluster access. Default: the kubeconfig. */
  connect?: (config: PortshiftConfig, options: CliOptions) => ClusterAccess;
  /** Observer override. Default: built from the observability config. */
  observer?: IObserver;
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function buildProgram(): Command {
  return new Command()
    .name('portshift')
    .description('Toggle port forwards to the services of a cluster namespace')
    .version(VERSION, '-v, --version')
    .option('-n, --namespace <namespace>', 'namespace to load (default: config, kube context, then "default")')
    .option('--context <context>', 'kube context to use')
    .option('--kubeconfig <path>', 'kubeconfig file to load')
    .option('--config <path>', 'config file (default: ~/.portshift/config.json)')
    .option('-l, --list', 'print the ports of the namespace and exit')
    .option('--log-level <level>', `log level (${LOG_LEVELS.join(', ')})`)
    .showHelpAfterError();
}

export function connectKubernetes(config: PortshiftConfig, options: CliOptions): ClusterAccess {
  const kubeConfig = loadKubeConfig({
    kubeconfig: options.kubeconfig ?? config.kubernetes.kubeconfig,
    context: options.context ?? config.kubernetes.context,
  });
  return {
    provider: KubernetesSnapshotProvider.fromKubeConfig(kubeConfig),
    contextNamespace: contextNamespace(kubeConfig),
    transport: (namespace) => KubernetesTransport.fromKubeConfig(kubeConfig, namespace),
  };
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

export async function run(argv: readonly string[], env: CliEnvironment): Promise<number> {
  const fail = (message: string): number => {
    env.stderr.write(`${CROSS} ${message}\n`);
    return 1;
  };

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => env.stdout.write(text),
      writeErr: (text) => env.stderr.write(text),
    });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const options = program.opts<CliOptions>();

  let config: PortshiftConfig;
  try {
    config = loadConfig(options.config);
  } catch (err) {
    if (err instanceof ConfigError) return fail(err.message);
    throw err;
  }

  let logLevel: LogLevel = config.observability.logLevel;
  if (options.logLevel !== undefined) {
    const level = LOG_LEVELS.find((candidate) => candidate === options.logLevel);
    if (!level) return fail(`Unknown log level "${options.logLevel}" (expected ${LOG_LEVELS.join(', ')})`);
    logLevel = level;
  }

  let access: ClusterAccess;
  try {
    access = (env.connect ?? connectKubernetes)(config, options);
  } catch (err) {
    if (err instanceof ConfigError) return fail(err.message);
    throw err;
  }

  const namespace = resolveNamespace(options.namespace, config, access.contextNamespace);
  if (!isValidNamespace(namespace)) {
    return fail(`"${namespace}" is not a valid namespace name`);
  }

  // The interactive view owns the terminal, so console logging is only
  // turned on for --list. Sink failures are reported once it has exited.
  const logFailures = new LogFailures();
  const observer =
    env.observer ??
    createObserver(
      {
        ...config.observability,
        observers: options.list ? ['console'] : config.observability.observers,
        logLevel,
      },
      logFailures,
    );

  try {
    let entries: readonly PortEntry[];
    try {
      entries = await discover(access.provider, namespace, observer);
    } catch (err) {
      return fail(`Cannot load namespace "${namespace}": ${toError(err).message}`);
    }

    if (options.list) {
      env.stdout.write(formatCatalogue(namespace, entries).join('\n') + '\n');
      return 0;
    }

    if (env.stdin.isTTY !== true) {
      return fail('The interactive view needs a terminal. Use --list to print the ports instead.');
    }

    await interactive(namespace, entries, access, config, observer, env);
    return 0;
  } finally {
    await observer.flush?.();
    const summary = logFailures.summary();
    if (summary) env.stderr.write(`${WARN} ${summary}\n`);
  }
}

async function interactive(
  namespace: string,
  entries: readonly PortEntry[],
  access: ClusterAccess,
  config: PortshiftConfig,
  observer: IObserver,
  env: CliEnvironment,
): Promise<void> {
  const driver = new TunnelDriver(access.transport(namespace), {
    bindAddress: config.tunnels.bindAddress,
    setupTimeoutMs: config.tunnels.setupTimeoutMs,
  });
  const manager = new SessionManager({
    driver,
    entries,
    observer,
    policy: {
      bulkTieBreak: config.sessions.bulkTieBreak,
      preferRemotePort: config.tunnels.preferRemotePort,
      retry: config.sessions.retry,
    },
  });

  manager.start();
  try {
    await runTui({ session: manager, namespace, input: env.stdin, output: env.stdout });
  } finally {
    await manager.stop();
  }
}
