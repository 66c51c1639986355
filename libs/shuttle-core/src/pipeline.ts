import type { Middleware, NextHandler, Transport } from './types';

export function isTransport(value: unknown): value is Transport {
  return (
    typeof value === 'object' &&
    value !== null &&
    'execute' in value &&
    typeof value.execute === 'function' &&
    'setDebug' in value &&
    typeof value.setDebug === 'function'
  );
}

export function isMiddleware(value: unknown): value is Middleware {
  return (
    typeof value === 'object' &&
    value !== null &&
    'process' in value &&
    typeof value.process === 'function'
  );
}

/**
 * Fold the middleware list into one handler ending in `kernel`.
 *
 * Layers run in declared order on the way in; each one sees the response of
 * the layers after it on the way out. The fold starts from the last layer so
 * that the first layer ends up outermost.
 */
export function compileMiddleware(
  layers: readonly Middleware[],
  kernel: NextHandler
): NextHandler {
  return layers.reduceRight<NextHandler>(
    (next, middleware) => (request) => middleware.process(request, next),
    (request) => kernel(request)
  );
}
