import { UnknownVersionError } from './errors';
import { HeaderBag } from './HeaderBag';
import type { HeaderValue, ProtocolVersion } from './types';

/**
 * Normalize the spellings callers use for a protocol version.
 * `1`, `"1.0"`, `1.1`, `"2.0"` and friends are accepted.
 */
export function parseProtocolVersion(value: unknown): ProtocolVersion {
  let text = value;
  if (typeof value === 'number') {
    text = Number.isInteger(value) ? value.toFixed(1) : String(value);
  }
  switch (text) {
    case '1':
    case '1.0':
      return '1.0';
    case '1.1':
      return '1.1';
    case '2':
    case '2.0':
      return '2';
    default:
      throw new UnknownVersionError(value);
  }
}

/**
 * State shared by requests and responses. Subclasses expose `with*` mutators
 * built on `clone()`, which copies the instance before applying a change.
 */
export abstract class Message {
  protected headers: HeaderBag;
  protected version: ProtocolVersion;

  protected constructor(headers: HeaderBag, version: ProtocolVersion) {
    this.headers = headers;
    this.version = version;
  }

  protected clone(apply: (copy: this) => void): this {
    const copy: this = Object.create(Object.getPrototypeOf(this));
    Object.assign(copy, this);
    apply(copy);
    return copy;
  }

  getProtocolVersion(): ProtocolVersion {
    return this.version;
  }

  withProtocolVersion(version: ProtocolVersion | number | string): this {
    const parsed = parseProtocolVersion(version);
    return this.clone((copy) => {
      copy.version = parsed;
    });
  }

  getHeaders(): HeaderBag {
    return this.headers;
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name);
  }

  getHeader(name: string): string[] {
    return this.headers.get(name);
  }

  /** All values of `name` joined with ", "; empty string when absent. */
  getHeaderLine(name: string): string {
    return this.headers.line(name);
  }

  withHeader(name: string, value: HeaderValue): this {
    const headers = this.headers.with(name, value);
    return this.clone((copy) => {
      copy.headers = headers;
    });
  }

  withAddedHeader(name: string, value: HeaderValue): this {
    const headers = this.headers.withAdded(name, value);
    return this.clone((copy) => {
      copy.headers = headers;
    });
  }

  withoutHeader(name: string): this {
    const headers = this.headers.without(name);
    return this.clone((copy) => {
      copy.headers = headers;
    });
  }
}
