import { describe, expect, it, vi } from 'vitest';
import { compileMiddleware, isMiddleware, isTransport } from '../pipeline';
import { Request } from '../Request';
import { Response } from '../Response';
import { ScriptedTransport } from '../transport/ScriptedTransport';
import type { Middleware } from '../types';

function tracing(name: string, trace: string[]): Middleware {
  return {
    process: async (request, next) => {
      trace.push(`${name}:in`);
      const response = await next(request.withAddedHeader('X-Trace', name));
      trace.push(`${name}:out`);
      return response;
    },
  };
}

describe('compileMiddleware', () => {
  it('runs layers in declared order on the way in and reverse order on the way out', async () => {
    const trace: string[] = [];
    const kernel = vi.fn(async (request: Request) => {
      trace.push('kernel');
      return new Response(200, request.getHeaderLine('X-Trace'));
    });

    const pipeline = compileMiddleware(
      [tracing('A', trace), tracing('B', trace)],
      kernel
    );
    const response = await pipeline(new Request('GET', 'http://example.com/'));

    expect(trace).toEqual(['A:in', 'B:in', 'kernel', 'B:out', 'A:out']);
    expect(await response.text()).toBe('A, B');
  });

  it('calls the kernel directly when there are no layers', async () => {
    const kernel = vi.fn(async () => new Response(204));
    const response = await compileMiddleware([], kernel)(
      new Request('GET', 'http://example.com/')
    );

    expect(response.getStatusCode()).toBe(204);
    expect(kernel).toHaveBeenCalledTimes(1);
  });

  it('stops at a layer that does not call next', async () => {
    const trace: string[] = [];
    const kernel = vi.fn(async () => new Response(200));
    const cached: Middleware = { process: async () => new Response(304) };

    const pipeline = compileMiddleware(
      [tracing('A', trace), cached, tracing('B', trace)],
      kernel
    );
    const response = await pipeline(new Request('GET', 'http://example.com/'));

    expect(response.getStatusCode()).toBe(304);
    expect(trace).toEqual(['A:in', 'A:out']);
    expect(kernel).not.toHaveBeenCalled();
  });
});

describe('contract guards', () => {
  it('recognizes transports', () => {
    expect(isTransport(new ScriptedTransport())).toBe(true);
    expect(isTransport({ execute: () => undefined })).toBe(false);
    expect(isTransport('NotAHandler')).toBe(false);
    expect(isTransport(null)).toBe(false);
  });

  it('recognizes middleware', () => {
    expect(isMiddleware({ process: () => undefined })).toBe(true);
    expect(isMiddleware({ handle: () => undefined })).toBe(false);
    expect(isMiddleware(42)).toBe(false);
  });
});
