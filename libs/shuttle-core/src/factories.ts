import { ConsoleLogger } from './logger';
import { Shuttle } from './Shuttle';
import {
  NetworkTransport,
  type NetworkTransportOptions,
} from './transport/NetworkTransport';
import type { ShuttleOptions } from './types';

export interface DefaultShuttleOptions extends ShuttleOptions {
  /** Options for the NetworkTransport built when no `handler` is given. */
  transport?: Omit<NetworkTransportOptions, 'logger'>;
}

/**
 * Creates a Shuttle with a console logger wired into the client and into the
 * default network transport.
 *
 * Defaults applied:
 * - Handler: NetworkTransport (2 MiB in-memory body, 10 redirects,
 *   120s connect timeout)
 * - Logger: console logger
 * - Protocol version: 1.1
 *
 * @example
 * ```typescript
 * const shuttle = createDefaultShuttle({
 *   baseUrl: 'https://api.example.com',
 *   transport: { connectTimeoutMs: 10_000 },
 * });
 * ```
 */
export function createDefaultShuttle(
  options: DefaultShuttleOptions = {}
): Shuttle {
  const { transport, ...shuttleOptions } = options;
  const logger = options.logger ?? new ConsoleLogger();
  const handler =
    options.handler ?? new NetworkTransport({ ...transport, logger });

  return new Shuttle({ ...shuttleOptions, handler, logger });
}
