import { z, type ZodError } from 'zod';
import { ConfigurationError } from './errors';
import { parseProtocolVersion } from './Message';
import { isMiddleware, isTransport } from './pipeline';
import type {
  HeaderInput,
  Logger,
  Middleware,
  ProtocolVersion,
  ShuttleOptions,
  Transport,
} from './types';

export const DEBUG_ENV_VAR = 'SHUTTLE_DEBUG';

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'info' in value &&
    typeof value.info === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function' &&
    'error' in value &&
    typeof value.error === 'function'
  );
}

export const shuttleOptionsSchema = z.object({
  handler: z
    .custom<Transport>(isTransport, {
      message:
        'handler must implement the Transport contract: ' +
        'execute(request) and setDebug(enabled)',
    })
    .optional(),
  httpVersion: z.union([z.string(), z.number()]).optional(),
  baseUrl: z.string().optional(),
  headers: z.record(z.union([z.string(), z.array(z.string())])).optional(),
  middleware: z
    .array(
      z.custom<Middleware>(isMiddleware, {
        message: 'middleware must implement process(request, next)',
      })
    )
    .optional(),
  debug: z.boolean().optional(),
  logger: z
    .custom<Logger>(isLogger, {
      message: 'logger must implement debug, info, warn and error',
    })
    .optional(),
});

export interface ResolvedShuttleConfig {
  handler?: Transport;
  httpVersion: ProtocolVersion;
  baseUrl?: string;
  headers: HeaderInput;
  middleware: Middleware[];
  debug: boolean;
  logger?: Logger;
}

/** Convert a zod failure into a ConfigurationError listing every issue. */
export function toConfigurationError(
  label: string,
  error: ZodError
): ConfigurationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues
    .map((issue) => `${issue.path || '(root)'}: ${issue.message}`)
    .join('; ');
  return new ConfigurationError(`Invalid ${label} options: ${summary}`, {
    issues,
    cause: error,
  });
}

/**
 * Validate user options and merge them over the documented defaults.
 * `handler` is left unset when absent so the caller can build its default.
 */
export function resolveShuttleConfig(
  options: ShuttleOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedShuttleConfig {
  const parsed = shuttleOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toConfigurationError('Shuttle', parsed.error);
  }

  const data = parsed.data;
  return {
    handler: data.handler,
    httpVersion: parseProtocolVersion(data.httpVersion ?? '1.1'),
    baseUrl: data.baseUrl,
    headers: data.headers ?? {},
    middleware: data.middleware ?? [],
    debug: data.debug ?? env[DEBUG_ENV_VAR] === '1',
    logger: data.logger,
  };
}
