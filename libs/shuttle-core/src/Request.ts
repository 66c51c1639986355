import { HeaderBag } from './HeaderBag';
import { Message, parseProtocolVersion } from './Message';
import type { Stream } from './stream/Stream';
import type { HeaderInput, ProtocolVersion } from './types';

const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

function normalizeMethod(method: string): string {
  if (!METHOD_TOKEN.test(method)) {
    throw new TypeError(`Invalid HTTP method: "${method}"`);
  }
  return method.toUpperCase();
}

function normalizeTarget(target: string | URL): string {
  return typeof target === 'string' ? target : target.toString();
}

/**
 * Immutable outgoing request. Every `with*` call returns a new instance.
 */
export class Request extends Message {
  private method: string;
  private target: string;
  private body?: Stream;

  constructor(
    method: string,
    target: string | URL,
    body?: Stream,
    headers?: HeaderInput | HeaderBag,
    version: ProtocolVersion | number | string = '1.1'
  ) {
    super(
      headers instanceof HeaderBag ? headers : new HeaderBag(headers),
      parseProtocolVersion(version)
    );
    this.method = normalizeMethod(method);
    this.target = normalizeTarget(target);
    this.body = body;
  }

  getMethod(): string {
    return this.method;
  }

  withMethod(method: string): Request {
    const normalized = normalizeMethod(method);
    return this.clone((copy) => {
      copy.method = normalized;
    });
  }

  getTarget(): string {
    return this.target;
  }

  /** Parse the target. Throws a TypeError when it is not an absolute URL. */
  getUri(): URL {
    return new URL(this.target);
  }

  withUri(target: string | URL): Request {
    const normalized = normalizeTarget(target);
    return this.clone((copy) => {
      copy.target = normalized;
    });
  }

  getBody(): Stream | undefined {
    return this.body;
  }

  withBody(body: Stream | undefined): Request {
    return this.clone((copy) => {
      copy.body = body;
    });
  }
}
