import type { Request } from './Request';

export class ShuttleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ShuttleError';
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Raised synchronously while a client or transport is being constructed.
 * Never retryable: the same options will fail the same way.
 */
export class ConfigurationError extends ShuttleError {
  readonly issues: ConfigurationIssue[];

  constructor(
    message: string,
    options?: { issues?: ConfigurationIssue[]; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ConfigurationError';
    this.issues = options?.issues ?? [];
  }
}

export class UnknownVersionError extends ConfigurationError {
  readonly version: unknown;

  constructor(version: unknown) {
    super(`Unknown HTTP protocol version: ${String(version)}`, {
      issues: [{ path: 'httpVersion', message: 'expected one of 1.0, 1.1, 2' }],
    });
    this.name = 'UnknownVersionError';
    this.version = version;
  }
}

/**
 * Network, TLS or engine failure during a transport exchange.
 *
 * An HTTP error status is not a TransportError: 4xx and 5xx responses are
 * returned as ordinary responses.
 */
export class TransportError extends ShuttleError {
  readonly code?: string;
  readonly request?: Request;

  constructor(
    message: string,
    options?: { code?: string; request?: Request; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.code = options?.code;
    this.request = options?.request;
  }
}

export class QueueExhaustedError extends ShuttleError {
  constructor(
    message = 'No more responses available in the scripted transport queue'
  ) {
    super(message);
    this.name = 'QueueExhaustedError';
  }
}
