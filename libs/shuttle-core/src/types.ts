import type { Request } from './Request';
import type { Response } from './Response';

/** HTTP protocol versions a request may be sent with. */
export type ProtocolVersion = '1.0' | '1.1' | '2';

export type HeaderValue = string | readonly string[];

export type HeaderInput = Record<string, HeaderValue>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export type LogLevel = keyof Logger;

/**
 * A transport turns a Request into a Response through real or simulated I/O.
 *
 * Implementations must keep per-call state local to `execute`, so that
 * sequential calls on the same instance never leak into each other.
 */
export interface Transport {
  execute(request: Request): Promise<Response>;

  /** Toggle verbose diagnostics. Returns the transport for chaining. */
  setDebug(enabled: boolean): this;
}

/** The remainder of the pipeline as seen from one middleware. */
export type NextHandler = (request: Request) => Promise<Response>;

/**
 * A request/response interceptor.
 *
 * A middleware decides whether `next` runs at all, how many times and with
 * which request. Not calling `next` short-circuits the pipeline.
 */
export interface Middleware {
  process(request: Request, next: NextHandler): Promise<Response>;
}

export interface RequestOptions {
  /** Per-call headers. These replace client defaults of the same name. */
  headers?: HeaderInput;
}

export interface ShuttleOptions {
  /** Transport used for every call. Defaults to a NetworkTransport. */
  handler?: Transport;
  /** Protocol version of every request built by `request()`. Default "1.1". */
  httpVersion?: ProtocolVersion | number | string;
  /** Literal prefix for string targets passed to `request()`. */
  baseUrl?: string;
  /** Headers added to every request built by `request()`. */
  headers?: HeaderInput;
  /** Middleware, executed in the order given. */
  middleware?: Middleware[];
  /** Enables transport diagnostics. Falls back to SHUTTLE_DEBUG=1. */
  debug?: boolean;
  logger?: Logger;
}
