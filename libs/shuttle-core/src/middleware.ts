// ============================================================================
// Stock middleware
// ============================================================================

import { TransportError } from './errors';
import { errorToLog } from './logger';
import type { Request } from './Request';
import type { Response } from './Response';
import type { Logger, LogLevel, Middleware, NextHandler } from './types';

// ============================================================================
// Auth
// ============================================================================

export interface AuthMiddlewareOptions {
  getToken: () =>
    | Promise<string | null | undefined>
    | string
    | null
    | undefined;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Creates a middleware that sets an authorization header on each request.
 *
 * @example
 * ```typescript
 * const shuttle = new Shuttle({
 *   middleware: [
 *     createAuthMiddleware({ getToken: () => process.env.API_TOKEN }),
 *   ],
 * });
 * ```
 */
export function createAuthMiddleware(opts: AuthMiddlewareOptions): Middleware {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return {
    process: async (request: Request, next: NextHandler) => {
      const token = await opts.getToken();
      return next(
        token ? request.withHeader(headerName, formatToken(token)) : request
      );
    },
  };
}

// ============================================================================
// Logging
// ============================================================================

export interface LoggingMiddlewareOptions {
  logger: Logger;
  level?: LogLevel; // default: "info"
}

export function createLoggingMiddleware(
  opts: LoggingMiddlewareOptions
): Middleware {
  const level = opts.level ?? 'info';

  return {
    process: async (request: Request, next: NextHandler) => {
      const meta = {
        method: request.getMethod(),
        target: request.getTarget(),
      };
      const startedAt = Date.now();
      opts.logger[level]('shuttle.request.start', meta);

      let response: Response;
      try {
        response = await next(request);
      } catch (error) {
        opts.logger.error('shuttle.request.failed', {
          ...meta,
          durationMs: Date.now() - startedAt,
          error: errorToLog(error),
        });
        throw error;
      }

      opts.logger[level]('shuttle.request.complete', {
        ...meta,
        status: response.getStatusCode(),
        durationMs: Date.now() - startedAt,
      });
      return response;
    },
  };
}

// ============================================================================
// Retry
// ============================================================================

export interface RetryMiddlewareOptions {
  maxAttempts?: number; // default: 3, counting the first attempt
  baseDelayMs?: number; // default: 200
  maxDelayMs?: number; // default: 2000
  /** Statuses that trigger another attempt. None by default. */
  retryOnStatuses?: readonly number[];
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Creates a middleware that re-sends a request after a TransportError, or
 * after one of `retryOnStatuses`, with exponential backoff.
 *
 * Any other error propagates on the first occurrence. When attempts run out
 * the last error is thrown, or the last response is returned.
 */
export function createRetryMiddleware(
  opts: RetryMiddlewareOptions = {}
): Middleware {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  const baseDelayMs = opts.baseDelayMs ?? 200;
  const maxDelayMs = opts.maxDelayMs ?? 2000;
  const retryOnStatuses = new Set(opts.retryOnStatuses ?? []);
  const sleep = opts.sleep ?? defaultSleep;

  return {
    process: async (request: Request, next: NextHandler) => {
      for (let attempt = 1; ; attempt++) {
        const isLastAttempt = attempt >= maxAttempts;
        try {
          const response = await next(request);
          const status = response.getStatusCode();
          if (isLastAttempt || !retryOnStatuses.has(status)) {
            return response;
          }
        } catch (error) {
          if (isLastAttempt || !(error instanceof TransportError)) {
            throw error;
          }
        }
        await sleep(Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs));
      }
    },
  };
}
