/**
 * CLI configuration.
 *
 * `~/.portshift/config.json` (or the file given with `--config`) is
 * deep-merged over the defaults. `${VAR}` references in string values are
 * replaced from the environment, missing variables becoming ''. Every
 * validation problem is collected and reported in one ConfigLoadError.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError } from '@portshift/core';
import { LOG_LEVELS, type LogLevel } from '@portshift/observability';
import type { BulkTieBreak, RetryPolicy } from '@portshift/sessions';
import { OBSERVER_NAMES, type ObserverName } from './observer.js';

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

export interface PortshiftConfig {
  kubernetes: {
    /** Kubeconfig file. Default: KUBECONFIG or ~/.kube/config. */
    kubeconfig?: string;
    context?: string;
    namespace?: string;
  };
  tunnels: {
    bindAddress: string;
    preferRemotePort: boolean;
    setupTimeoutMs: number;
  };
  sessions: {
    bulkTieBreak: BulkTieBreak;
    retry: RetryPolicy;
  };
  observability: {
    observers: ObserverName[];
    logLevel: LogLevel;
    logPath?: string;
    maxLogSize?: number;
  };
}

export class ConfigLoadError extends ConfigError {
  readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(message, problems.length > 0 ? { problems } : undefined);
    this.name = 'ConfigLoadError';
    this.problems = problems;
  }
}

const TIE_BREAKS: readonly BulkTieBreak[] = ['start', 'stop'];
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getPortshiftDir(): string {
  return resolve(homedir(), '.portshift');
}

export function getConfigPath(): string {
  return join(getPortshiftDir(), 'config.json');
}

export function getLogsDir(): string {
  return join(getPortshiftDir(), 'logs');
}

export function configExists(path = getConfigPath()): boolean {
  return existsSync(path);
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): PortshiftConfig {
  return {
    kubernetes: {},
    tunnels: {
      bindAddress: '127.0.0.1',
      preferRemotePort: true,
      setupTimeoutMs: 15_000,
    },
    sessions: {
      bulkTieBreak: 'start',
      retry: { maxAttempts: 0, backoffBaseMs: 1_000, backoffMaxMs: 30_000 },
    },
    observability: {
      observers: ['file'],
      logLevel: 'info',
      logPath: join(getLogsDir(), 'portshift.jsonl'),
    },
  };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Load and validate the configuration. A missing file yields the defaults;
 * an explicit `path` that does not exist is an error.
 */
export function loadConfig(path?: string): PortshiftConfig {
  const file = path ? resolve(path) : getConfigPath();
  const defaults = getDefaultConfig();

  let user: Record<string, unknown> = {};
  if (existsSync(file)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Cannot parse ${file}: ${reason}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigLoadError(`${file} must contain a JSON object`);
    }
    user = parsed;
  } else if (path) {
    throw new ConfigLoadError(`Config file not found: ${file}`);
  }

  const merged = resolveEnvVars(deepMerge(toRecord(defaults), user));
  return validate(merged, defaults, file);
}

/**
 * Namespace precedence: command line, config file, kube context, 'default'.
 */
export function resolveNamespace(
  fromFlag: string | undefined,
  config: PortshiftConfig,
  fromContext: string | undefined,
): string {
  return fromFlag || config.kubernetes.namespace || fromContext || 'default';
}

export function isValidNamespace(name: string): boolean {
  return name.length <= 63 && NAMESPACE_PATTERN.test(name);
}

// ---------------------------------------------------------------------------
// Merge / env
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(config: PortshiftConfig): Record<string, unknown> {
  return { ...config };
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return out;
}

function resolveEnvVars(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = resolveEnvValue(item);
  }
  return out;
}

function resolveEnvValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) return value.map(resolveEnvValue);
  if (isRecord(value)) return resolveEnvVars(value);
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

class Reader {
  readonly problems: string[] = [];

  section(parent: Record<string, unknown>, path: string): Record<string, unknown> {
    const value = parent[lastKey(path)];
    if (isRecord(value)) return value;
    this.problems.push(`${path} must be an object`);
    return {};
  }

  string(obj: Record<string, unknown>, path: string, fallback: string): string {
    const value = obj[lastKey(path)];
    if (typeof value === 'string' && value.length > 0) return value;
    this.problems.push(`${path} must be a non-empty string`);
    return fallback;
  }

  optionalString(obj: Record<string, unknown>, path: string): string | undefined {
    const value = obj[lastKey(path)];
    if (value === undefined || value === null || value === '') return undefined;
    if (typeof value === 'string') return value;
    this.problems.push(`${path} must be a string`);
    return undefined;
  }

  boolean(obj: Record<string, unknown>, path: string, fallback: boolean): boolean {
    const value = obj[lastKey(path)];
    if (typeof value === 'boolean') return value;
    this.problems.push(`${path} must be true or false`);
    return fallback;
  }

  integer(obj: Record<string, unknown>, path: string, fallback: number, min: number): number {
    const value = obj[lastKey(path)];
    if (typeof value === 'number' && Number.isInteger(value) && value >= min) return value;
    this.problems.push(`${path} must be an integer >= ${min}`);
    return fallback;
  }

  optionalInteger(obj: Record<string, unknown>, path: string, min: number): number | undefined {
    if (obj[lastKey(path)] === undefined) return undefined;
    return this.integer(obj, path, min, min);
  }

  oneOf<T extends string>(obj: Record<string, unknown>, path: string, allowed: readonly T[], fallback: T): T {
    const value = obj[lastKey(path)];
    const match = allowed.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.problems.push(`${path} must be one of: ${allowed.join(', ')}`);
    return fallback;
  }

  stringList<T extends string>(obj: Record<string, unknown>, path: string, allowed: readonly T[], fallback: T[]): T[] {
    const value = obj[lastKey(path)];
    if (!Array.isArray(value)) {
      this.problems.push(`${path} must be an array`);
      return fallback;
    }
    const out: T[] = [];
    for (const item of value) {
      const match = allowed.find((candidate) => candidate === item);
      if (match !== undefined) {
        out.push(match);
      } else {
        this.problems.push(`${path} contains unknown entry ${JSON.stringify(item)} (allowed: ${allowed.join(', ')})`);
      }
    }
    return out;
  }
}

function lastKey(path: string): string {
  const dot = path.lastIndexOf('.');
  return dot === -1 ? path : path.slice(dot + 1);
}

function validate(raw: Record<string, unknown>, defaults: PortshiftConfig, file: string): PortshiftConfig {
  const r = new Reader();

  const kubernetes = r.section(raw, 'kubernetes');
  const namespace = r.optionalString(kubernetes, 'kubernetes.namespace');
  if (namespace !== undefined && !isValidNamespace(namespace)) {
    r.problems.push(`kubernetes.namespace "${namespace}" is not a valid namespace name`);
  }

  const tunnels = r.section(raw, 'tunnels');
  const sessions = r.section(raw, 'sessions');
  const retry = r.section(sessions, 'sessions.retry');
  const observability = r.section(raw, 'observability');

  const backoffBaseMs = r.integer(retry, 'sessions.retry.backoffBaseMs', defaults.sessions.retry.backoffBaseMs, 1);
  const backoffMaxMs = r.integer(retry, 'sessions.retry.backoffMaxMs', defaults.sessions.retry.backoffMaxMs, 1);
  if (backoffMaxMs < backoffBaseMs) {
    r.problems.push('sessions.retry.backoffMaxMs must be >= sessions.retry.backoffBaseMs');
  }

  const config: PortshiftConfig = {
    kubernetes: {
      kubeconfig: r.optionalString(kubernetes, 'kubernetes.kubeconfig'),
      context: r.optionalString(kubernetes, 'kubernetes.context'),
      namespace,
    },
    tunnels: {
      bindAddress: r.string(tunnels, 'tunnels.bindAddress', defaults.tunnels.bindAddress),
      preferRemotePort: r.boolean(tunnels, 'tunnels.preferRemotePort', defaults.tunnels.preferRemotePort),
      setupTimeoutMs: r.integer(tunnels, 'tunnels.setupTimeoutMs', defaults.tunnels.setupTimeoutMs, 1),
    },
    sessions: {
      bulkTieBreak: r.oneOf(sessions, 'sessions.bulkTieBreak', TIE_BREAKS, defaults.sessions.bulkTieBreak),
      retry: {
        maxAttempts: r.integer(retry, 'sessions.retry.maxAttempts', defaults.sessions.retry.maxAttempts, 0),
        backoffBaseMs,
        backoffMaxMs,
      },
    },
    observability: {
      observers: r.stringList(observability, 'observability.observers', OBSERVER_NAMES, defaults.observability.observers),
      logLevel: r.oneOf(observability, 'observability.logLevel', LOG_LEVELS, defaults.observability.logLevel),
      logPath: r.optionalString(observability, 'observability.logPath'),
      maxLogSize: r.optionalInteger(observability, 'observability.maxLogSize', 1),
    },
  };

  if (r.problems.length > 0) {
    throw new ConfigLoadError(
      `Invalid configuration in ${file}:\n${r.problems.map((p) => `  - ${p}`).join('\n')}`,
      r.problems,
    );
  }
  return config;
}
