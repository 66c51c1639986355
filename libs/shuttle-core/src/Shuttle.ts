import { isBody } from './body';
import { resolveShuttleConfig, type ResolvedShuttleConfig } from './config';
import { compileMiddleware } from './pipeline';
import { Request } from './Request';
import type { Response } from './Response';
import type { Stream } from './stream/Stream';
import { NetworkTransport } from './transport/NetworkTransport';
import type {
  Logger,
  NextHandler,
  RequestOptions,
  ShuttleOptions,
  Transport,
} from './types';

export const SHUTTLE_USER_AGENT = 'Shuttle/1.0';

export const DEFAULT_USER_AGENT =
  `${SHUTTLE_USER_AGENT} Node/${process.versions.node}`;

/**
 * HTTP client: builds requests from configuration and runs them through the
 * middleware chain into the transport.
 *
 * @example
 * ```typescript
 * const shuttle = new Shuttle({
 *   baseUrl: 'https://api.example.com',
 *   headers: { Accept: 'application/json' },
 * });
 * const response = await shuttle.post(
 *   '/items',
 *   new JsonBody({ name: 'widget' })
 * );
 * ```
 */
export class Shuttle {
  private readonly config: ResolvedShuttleConfig;
  private readonly handler: Transport;
  private readonly pipeline: NextHandler;
  private readonly logger?: Logger;

  constructor(options: ShuttleOptions = {}) {
    this.config = resolveShuttleConfig(options);
    this.logger = this.config.logger;
    this.handler =
      this.config.handler ??
      new NetworkTransport({ logger: this.config.logger });

    if (this.config.debug) {
      this.handler.setDebug(true);
    }

    const handler = this.handler;
    this.pipeline = compileMiddleware(this.config.middleware, (request) =>
      handler.execute(request)
    );
  }

  getHandler(): Transport {
    return this.handler;
  }

  async request(
    method: string,
    target: string | URL,
    body?: Stream,
    options: RequestOptions = {}
  ): Promise<Response> {
    const { baseUrl, httpVersion } = this.config;
    const uri =
      typeof target === 'string' && baseUrl !== undefined
        ? baseUrl + target
        : target;

    let request = new Request(method, uri, undefined, undefined, httpVersion);
    for (const [name, value] of Object.entries(this.config.headers)) {
      request = request.withAddedHeader(name, value);
    }
    if (!request.hasHeader('User-Agent')) {
      request = request.withHeader('User-Agent', DEFAULT_USER_AGENT);
    }
    if (body) {
      request = request.withBody(body);
      if (isBody(body)) {
        request = request.withHeader('Content-Type', body.getContentType());
      }
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      request = request.withHeader(name, value);
    }

    return this.sendRequest(request);
  }

  get(target: string | URL, options?: RequestOptions): Promise<Response> {
    return this.request('GET', target, undefined, options);
  }

  delete(target: string | URL, options?: RequestOptions): Promise<Response> {
    return this.request('DELETE', target, undefined, options);
  }

  head(target: string | URL, options?: RequestOptions): Promise<Response> {
    return this.request('HEAD', target, undefined, options);
  }

  options(target: string | URL, options?: RequestOptions): Promise<Response> {
    return this.request('OPTIONS', target, undefined, options);
  }

  post(
    target: string | URL,
    body?: Stream,
    options?: RequestOptions
  ): Promise<Response> {
    return this.request('POST', target, body, options);
  }

  put(
    target: string | URL,
    body?: Stream,
    options?: RequestOptions
  ): Promise<Response> {
    return this.request('PUT', target, body, options);
  }

  patch(
    target: string | URL,
    body?: Stream,
    options?: RequestOptions
  ): Promise<Response> {
    return this.request('PATCH', target, body, options);
  }

  /** Run an already-built request through the middleware chain. */
  async sendRequest(request: Request): Promise<Response> {
    this.logger?.debug('shuttle.send', {
      method: request.getMethod(),
      target: request.getTarget(),
    });
    return this.pipeline(request);
  }
}
