import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';
import http, { IncomingMessage } from 'node:http';
import https from 'node:https';
import { TransportError } from '../errors';
import type { Logger } from '../types';
import {
  splitHeaderLine,
  type EngineCallbacks,
  type EngineOptions,
  type HttpEngine,
} from './engine';

// `httpVersion` is only typed by recent axios releases.
type EngineRequestConfig = AxiosRequestConfig & { httpVersion?: 1 | 2 };

type RequestHeaders = Record<string, string | string[]>;

export interface AxiosEngineOptions {
  /** Defaults to a fresh `axios.create()`; global interceptors never apply. */
  instance?: AxiosInstance;
  /** Receives redirect hops when the exchange runs verbose. */
  logger?: Logger;
}

/**
 * Turn wire header lines back into the object axios takes.
 *
 * Bodies are passed through undecoded, so a request that does not name an
 * encoding asks for `identity` instead of axios' gzip/deflate/br default.
 */
function toRequestHeaders(lines: readonly string[]): RequestHeaders {
  const headers: RequestHeaders = {};
  const casing = new Map<string, string>();
  for (const line of lines) {
    const header = splitHeaderLine(line);
    if (!header) continue;
    const [name, value] = header;
    const key = casing.get(name.toLowerCase());
    if (key === undefined) {
      casing.set(name.toLowerCase(), name);
      headers[name] = value;
      continue;
    }
    const existing = headers[key];
    headers[key] = Array.isArray(existing)
      ? [...existing, value]
      : [existing, value];
  }
  if (!casing.has('accept-encoding')) {
    headers['Accept-Encoding'] = 'identity';
  }
  return headers;
}

function headLines(
  response: AxiosResponse<unknown>,
  fallbackVersion: string
): string[] {
  const raw =
    response.data instanceof IncomingMessage ? response.data : undefined;
  const version = raw?.httpVersion
    ? `HTTP/${raw.httpVersion}`
    : fallbackVersion;
  const reason = raw?.statusMessage || response.statusText || '';
  const lines = [`${version} ${response.status} ${reason}`.trimEnd()];

  if (raw && raw.rawHeaders.length > 0) {
    for (let i = 0; i + 1 < raw.rawHeaders.length; i += 2) {
      lines.push(`${raw.rawHeaders[i]}: ${raw.rawHeaders[i + 1]}`);
    }
    return lines;
  }

  for (const [name, value] of Object.entries(response.headers)) {
    const values: unknown = value;
    if (Array.isArray(values)) {
      for (const item of values) lines.push(`${name}: ${String(item)}`);
    } else if (values !== undefined && values !== null) {
      lines.push(`${name}: ${String(values)}`);
    }
  }
  return lines;
}

function toChunk(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TransportError(
    `HTTP engine produced an unsupported body chunk: ${typeof chunk}`
  );
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === 'object' && value !== null && Symbol.asyncIterator in value
  );
}

async function deliverBody(
  data: unknown,
  callbacks: EngineCallbacks
): Promise<void> {
  if (data === undefined || data === null || data === '') return;
  if (isAsyncIterable(data)) {
    for await (const chunk of data) {
      await callbacks.onBodyChunk(toChunk(chunk));
    }
    return;
  }
  await callbacks.onBodyChunk(toChunk(data));
}

/**
 * HttpEngine on axios' Node adapter.
 *
 * The response is requested as a raw, undecoded stream so that header lines
 * are reported as received and the body is delivered chunk by chunk. Every
 * status is accepted; an HTTP error status is a normal response here.
 */
export function createAxiosEngine(
  engineOptions: AxiosEngineOptions = {}
): HttpEngine {
  const instance = engineOptions.instance ?? axios.create();

  return {
    async perform(
      options: EngineOptions,
      callbacks: EngineCallbacks
    ): Promise<void> {
      const config: EngineRequestConfig = {
        url: options.url,
        method: options.method,
        headers: toRequestHeaders(options.headers),
        data: options.body,
        responseType: 'stream',
        decompress: false,
        validateStatus: () => true,
        maxRedirects: options.followRedirects ? options.maxRedirects : 0,
        maxBodyLength: Infinity,
        maxContentLength: -1,
        timeout: options.connectTimeoutMs,
        httpAgent: new http.Agent({ keepAlive: false }),
        httpsAgent: new https.Agent({
          keepAlive: false,
          rejectUnauthorized: options.verifyPeer,
        }),
        beforeRedirect: (redirect) => {
          const protocol: unknown = redirect.protocol;
          if (
            typeof protocol !== 'string' ||
            !options.protocols.includes(protocol)
          ) {
            throw new TransportError(
              `Refusing to follow redirect to protocol ${String(protocol)}`,
              { code: 'ERR_UNSUPPORTED_PROTOCOL' }
            );
          }
          if (options.verbose) {
            const href: unknown = redirect.href;
            engineOptions.logger?.debug('shuttle.engine.redirect', {
              location: String(href),
            });
          }
        },
      };
      if (options.httpVersion === 'HTTP/2') {
        config.httpVersion = 2;
      }

      const response = await instance.request<unknown>(config);
      for (const line of headLines(response, options.httpVersion)) {
        callbacks.onHeaderLine(line);
      }
      await deliverBody(response.data, callbacks);
    },
  };
}
