import { z } from 'zod';
import { toConfigurationError } from '../config';
import { ShuttleError, TransportError } from '../errors';
import {
  ConsoleLogger,
  errorToLog,
  sanitizeHeaderLine,
  sanitizeHeadersForLog,
} from '../logger';
import type { Request } from '../Request';
import type { Response } from '../Response';
import { DEFAULT_MAX_MEMORY, TempStream } from '../stream/TempStream';
import type { Logger, Transport } from '../types';
import { createAxiosEngine } from './axiosEngine';
import {
  buildRequestHeaders,
  resolveEngineHttpVersion,
  type EngineOptions,
  type HttpEngine,
} from './engine';
import { ResponseHeaderParser } from './ResponseHeaderParser';

export const ALLOWED_PROTOCOLS: readonly string[] = ['http:', 'https:'];

const BODYLESS_METHODS = new Set([
  'GET',
  'HEAD',
  'OPTIONS',
  'TRACE',
  'CONNECT',
]);

const DEFAULT_PORTS: Record<string, number> = { 'http:': 80, 'https:': 443 };

export interface NetworkTransportOptions {
  /** Bytes of response body kept in memory before spilling to a temp file. */
  maxResponseBodyMemory?: number;
  followRedirects?: boolean;
  maxRedirects?: number;
  connectTimeoutMs?: number;
  verifyPeer?: boolean;
  debug?: boolean;
  logger?: Logger;
  engine?: HttpEngine;
}

export interface TransportDefaults {
  readonly followRedirects: boolean;
  readonly maxRedirects: number;
  readonly connectTimeoutMs: number;
  readonly verifyPeer: boolean;
  readonly protocols: readonly string[];
}

const networkTransportOptionsSchema = z.object({
  maxResponseBodyMemory: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MAX_MEMORY),
  followRedirects: z.boolean().default(true),
  maxRedirects: z.number().int().nonnegative().default(10),
  connectTimeoutMs: z.number().int().positive().default(120_000),
  verifyPeer: z.boolean().default(true),
  debug: z.boolean().default(false),
});

function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Transport that performs real HTTP exchanges.
 *
 * All per-exchange state (engine options, header parser, body stream) lives
 * inside `execute`, so one instance can serve any number of sequential calls.
 * Response bodies are buffered into a TempStream before the Response is
 * returned.
 *
 * @example
 * ```typescript
 * const transport = new NetworkTransport({ connectTimeoutMs: 5_000 });
 * const response = await transport.execute(
 *   new Request('GET', 'https://example.com/')
 * );
 * console.log(response.getStatusCode(), await response.text());
 * ```
 */
export class NetworkTransport implements Transport {
  private readonly defaults: TransportDefaults;
  private readonly logger: Logger;
  private readonly engine: HttpEngine;
  private maxResponseBodyMemory: number;
  private debug: boolean;

  constructor(options: NetworkTransportOptions = {}) {
    const parsed = networkTransportOptionsSchema.safeParse({
      maxResponseBodyMemory: options.maxResponseBodyMemory,
      followRedirects: options.followRedirects,
      maxRedirects: options.maxRedirects,
      connectTimeoutMs: options.connectTimeoutMs,
      verifyPeer: options.verifyPeer,
      debug: options.debug,
    });
    if (!parsed.success) {
      throw toConfigurationError('NetworkTransport', parsed.error);
    }

    const config = parsed.data;
    this.defaults = Object.freeze({
      followRedirects: config.followRedirects,
      maxRedirects: config.maxRedirects,
      connectTimeoutMs: config.connectTimeoutMs,
      verifyPeer: config.verifyPeer,
      protocols: ALLOWED_PROTOCOLS,
    });
    this.maxResponseBodyMemory = config.maxResponseBodyMemory;
    this.debug = config.debug;
    this.logger = options.logger ?? new ConsoleLogger();
    this.engine =
      options.engine ?? createAxiosEngine({ logger: this.logger });
  }

  getDefaultOptions(): TransportDefaults {
    return this.defaults;
  }

  setDebug(enabled: boolean): this {
    this.debug = enabled;
    return this;
  }

  isDebug(): boolean {
    return this.debug;
  }

  setMaxResponseBodyMemory(bytes: number): this {
    if (!Number.isInteger(bytes) || bytes < 0) {
      throw new RangeError(
        `maxResponseBodyMemory must be a non-negative integer, got ${bytes}`
      );
    }
    this.maxResponseBodyMemory = bytes;
    return this;
  }

  getMaxResponseBodyMemory(): number {
    return this.maxResponseBodyMemory;
  }

  makeResponseBodyStream(): TempStream {
    return new TempStream(this.maxResponseBodyMemory);
  }

  /**
   * Build the engine options for `request` without performing any I/O on the
   * network. Reads the request body, rewinding it first when it is seekable.
   */
  async buildEngineOptions(request: Request): Promise<EngineOptions> {
    const uri = this.resolveTarget(request);
    const port =
      uri.port === '' ? DEFAULT_PORTS[uri.protocol] : Number(uri.port);
    const password = uri.password ? `:${uri.password}` : '';
    const userInfo = uri.username ? `${uri.username}${password}@` : '';
    const authority = `${userInfo}${uri.hostname}:${port}`;
    const method = request.getMethod();

    const options: EngineOptions = {
      method,
      url: `${uri.protocol}//${authority}${uri.pathname}${uri.search}`,
      port,
      httpVersion: resolveEngineHttpVersion(request.getProtocolVersion()),
      headers: buildRequestHeaders(request.getHeaders()),
      followRedirects: this.defaults.followRedirects,
      maxRedirects: this.defaults.maxRedirects,
      connectTimeoutMs: this.defaults.connectTimeoutMs,
      verifyPeer: this.defaults.verifyPeer,
      protocols: this.defaults.protocols,
      verbose: this.debug,
    };

    const body = request.getBody();
    if (body && !BODYLESS_METHODS.has(method)) {
      if (body.isSeekable()) {
        body.rewind();
      }
      options.body = await body.getContents();
    }
    return options;
  }

  async execute(request: Request): Promise<Response> {
    const parser = new ResponseHeaderParser();
    const body = this.makeResponseBodyStream();
    const startedAt = Date.now();

    try {
      const options = await this.buildEngineOptions(request);
      if (this.debug) {
        this.logger.debug('shuttle.transport.request', {
          line: `${options.method} ${options.url} ${options.httpVersion}`,
          headers: sanitizeHeadersForLog(request.getHeaders().entries()),
        });
      }

      await this.engine.perform(options, {
        onHeaderLine: (line) => {
          if (this.debug) {
            this.logger.debug('shuttle.transport.header', {
              line: sanitizeHeaderLine(line),
            });
          }
          parser.feed(line);
        },
        onBodyChunk: async (chunk) => {
          await body.write(chunk);
        },
      });
      const response = parser.build(body);
      body.rewind();

      if (this.debug) {
        this.logger.debug('shuttle.transport.complete', {
          status: response.getStatusCode(),
          bytes: body.getSize(),
          spilled: body.isSpilled(),
          durationMs: Date.now() - startedAt,
        });
      }
      return response;
    } catch (error) {
      await body.close();
      if (this.debug) {
        this.logger.debug('shuttle.transport.failed', {
          ...errorToLog(error),
          durationMs: Date.now() - startedAt,
        });
      }
      throw this.toTransportError(error, request);
    }
  }

  private resolveTarget(request: Request): URL {
    let uri: URL;
    try {
      uri = request.getUri();
    } catch (error) {
      throw new TransportError(
        `Invalid request target: ${request.getTarget()}`,
        { code: 'ERR_INVALID_URL', request, cause: error }
      );
    }
    if (!this.defaults.protocols.includes(uri.protocol)) {
      throw new TransportError(
        `Unsupported protocol ${uri.protocol} in ${request.getTarget()}`,
        { code: 'ERR_UNSUPPORTED_PROTOCOL', request }
      );
    }
    return uri;
  }

  private toTransportError(error: unknown, request: Request): TransportError {
    if (error instanceof TransportError) {
      return error.request
        ? error
        : new TransportError(error.message, {
            code: error.code,
            request,
            cause: error,
          });
    }
    if (error instanceof ShuttleError) {
      return new TransportError(error.message, { request, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message || 'HTTP engine failed', {
      code: errorCode(error),
      request,
      cause: error,
    });
  }
}
