import type { HeaderBag } from '../HeaderBag';
import { parseProtocolVersion } from '../Message';

export type EngineHttpVersion = 'HTTP/1.0' | 'HTTP/1.1' | 'HTTP/2';

/**
 * Everything an engine needs for one exchange. Built fresh for every call and
 * never shared between calls.
 */
export interface EngineOptions {
  method: string;
  /** Absolute URL with an explicit port, e.g. `http://example.com:80/`. */
  url: string;
  port: number;
  httpVersion: EngineHttpVersion;
  /** Wire header lines (`Name: value`), one per value, in declared order. */
  headers: string[];
  body?: Buffer;
  followRedirects: boolean;
  maxRedirects: number;
  connectTimeoutMs: number;
  verifyPeer: boolean;
  protocols: readonly string[];
  verbose: boolean;
}

export interface EngineCallbacks {
  /** Called once per status line and once per header line, in arrival order. */
  onHeaderLine(line: string): void;
  onBodyChunk(chunk: Buffer): Promise<void>;
}

/**
 * The I/O engine behind NetworkTransport. Resolves once the final response
 * body has been delivered; rejects on any network, TLS or protocol failure.
 */
export interface HttpEngine {
  perform(options: EngineOptions, callbacks: EngineCallbacks): Promise<void>;
}

const ENGINE_VERSIONS = {
  '1.0': 'HTTP/1.0',
  '1.1': 'HTTP/1.1',
  '2': 'HTTP/2',
} as const;

export function resolveEngineHttpVersion(version: unknown): EngineHttpVersion {
  return ENGINE_VERSIONS[parseProtocolVersion(version)];
}

export function buildRequestHeaders(headers: HeaderBag): string[] {
  const lines: string[] = [];
  for (const [name, values] of headers.entries()) {
    for (const value of values) {
      lines.push(`${name}: ${value}`);
    }
  }
  return lines;
}

/** Split a wire header line back into name and value. */
export function splitHeaderLine(line: string): [string, string] | undefined {
  const colon = line.indexOf(':');
  if (colon <= 0) return undefined;
  return [line.slice(0, colon).trim(), line.slice(colon + 1).trim()];
}
