import type { Logger, LoggerMeta } from './types';

const SENSITIVE_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'api-key',
  'x-api-key',
  'password',
  'token',
  'cookie',
  'set-cookie',
]);

/**
 * Console logger used when no logger is injected.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix = '[shuttle]') {}

  debug(message: string, meta?: LoggerMeta): void {
    meta
      ? console.debug(this.prefix, message, meta)
      : console.debug(this.prefix, message);
  }
  info(message: string, meta?: LoggerMeta): void {
    meta
      ? console.info(this.prefix, message, meta)
      : console.info(this.prefix, message);
  }
  warn(message: string, meta?: LoggerMeta): void {
    meta
      ? console.warn(this.prefix, message, meta)
      : console.warn(this.prefix, message);
  }
  error(message: string, meta?: LoggerMeta): void {
    meta
      ? console.error(this.prefix, message, meta)
      : console.error(this.prefix, message);
  }
}

/**
 * Mask values of headers that typically carry credentials.
 */
export function sanitizeHeadersForLog(
  headers: Iterable<[string, readonly string[]]>
): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [name, values] of headers) {
    sanitized[name] = SENSITIVE_HEADERS.has(name.toLowerCase())
      ? 'REDACTED'
      : values.join(', ');
  }
  return sanitized;
}

/** Same masking for a single `Name: value` wire line. */
export function sanitizeHeaderLine(line: string): string {
  const colon = line.indexOf(':');
  if (colon <= 0) return line;
  const name = line.slice(0, colon).trim();
  return SENSITIVE_HEADERS.has(name.toLowerCase()) ? `${name}: REDACTED` : line;
}

export function errorToLog(error: unknown): LoggerMeta {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}
