/**
 * Error taxonomy.
 *
 * Every error carries a stable `code` and an optional readonly `context`
 * bag. Discovery errors are fatal at startup; setup and stream errors are
 * contained in the status of one port entry.
 */

export class PortshiftError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PortshiftError';
    this.code = code;
    this.context = context;
  }
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export class DiscoveryError extends PortshiftError {
  readonly namespace: string;

  constructor(message: string, namespace: string, context?: Record<string, unknown>) {
    super(message, 'DISCOVERY_ERROR', { ...context, namespace });
    this.name = 'DiscoveryError';
    this.namespace = namespace;
  }
}

export class NamespaceNotFoundError extends DiscoveryError {
  constructor(namespace: string, context?: Record<string, unknown>) {
    super(`Namespace "${namespace}" not found`, namespace, context);
    this.name = 'NamespaceNotFoundError';
  }
}

export class ConnectionError extends DiscoveryError {
  constructor(message: string, namespace: string, context?: Record<string, unknown>) {
    super(message, namespace, context);
    this.name = 'ConnectionError';
  }
}

// ---------------------------------------------------------------------------
// Tunnels
// ---------------------------------------------------------------------------

export class SetupError extends PortshiftError {
  readonly ref: string;

  constructor(message: string, ref: string, context?: Record<string, unknown>) {
    super(message, 'SETUP_ERROR', { ...context, ref });
    this.name = 'SetupError';
    this.ref = ref;
  }
}

export class StreamError extends PortshiftError {
  readonly ref: string;

  constructor(message: string, ref: string, context?: Record<string, unknown>) {
    super(message, 'STREAM_ERROR', { ...context, ref });
    this.name = 'StreamError';
    this.ref = ref;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigError extends PortshiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Normalise anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
