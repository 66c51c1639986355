import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLoggingMiddleware } from '../middleware';
import { BufferBody, JsonBody } from '../body';
import {
  ConfigurationError,
  QueueExhaustedError,
  TransportError,
  UnknownVersionError,
} from '../errors';
import { Request } from '../Request';
import { Response } from '../Response';
import { DEFAULT_USER_AGENT, Shuttle, SHUTTLE_USER_AGENT } from '../Shuttle';
import { BufferStream } from '../stream/BufferStream';
import { NetworkTransport } from '../transport/NetworkTransport';
import { ScriptedTransport } from '../transport/ScriptedTransport';
import type { Middleware, Transport } from '../types';

function echoTransport(): ScriptedTransport {
  const ok = () => new Response(200);
  return new ScriptedTransport().append(ok, ok, ok, ok, ok);
}

function lastRequest(transport: ScriptedTransport): Request {
  const requests = transport.getRequests();
  const request = requests[requests.length - 1];
  if (!request) throw new Error('no request reached the transport');
  return request;
}

describe('Shuttle', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefixes string targets with the base URL', async () => {
    const handler = echoTransport();
    const shuttle = new Shuttle({
      handler,
      baseUrl: 'https://api.example.com',
    });

    await shuttle.get('/users');
    expect(lastRequest(handler).getTarget()).toBe(
      'https://api.example.com/users'
    );

    await shuttle.get(new URL('https://other.example.com/status'));
    expect(lastRequest(handler).getTarget()).toBe(
      'https://other.example.com/status'
    );
  });

  it('concatenates the base URL literally', async () => {
    const handler = echoTransport();
    const shuttle = new Shuttle({
      handler,
      baseUrl: 'https://api.example.com/v1',
    });

    await shuttle.get('users');
    expect(lastRequest(handler).getTarget()).toBe(
      'https://api.example.com/v1users'
    );
  });

  it('lets per-call headers replace client defaults', async () => {
    const handler = echoTransport();
    const shuttle = new Shuttle({
      handler,
      headers: {
        'X-Client': 'default',
        Accept: 'application/json',
        'X-Multi': ['a', 'b'],
      },
    });

    await shuttle.get('http://example.com/', {
      headers: { 'x-client': 'call' },
    });
    const request = lastRequest(handler);

    expect(request.getHeader('X-Client')).toEqual(['call']);
    expect(request.getHeaderLine('Accept')).toBe('application/json');
    expect(request.getHeaderLine('X-Multi')).toBe('a, b');
  });

  it('adds a User-Agent only when none is configured', async () => {
    const handler = echoTransport();

    await new Shuttle({ handler }).get('http://example.com/');
    expect(lastRequest(handler).getHeader('User-Agent')).toEqual([
      DEFAULT_USER_AGENT,
    ]);
    expect(DEFAULT_USER_AGENT).toBe(
      `${SHUTTLE_USER_AGENT} Node/${process.versions.node}`
    );

    await new Shuttle({
      handler,
      headers: { 'user-agent': 'custom/1.0' },
    }).get('http://example.com/');
    expect(lastRequest(handler).getHeader('User-Agent')).toEqual([
      'custom/1.0',
    ]);
  });

  it('attaches bodies and their content type', async () => {
    const handler = echoTransport();
    const shuttle = new Shuttle({ handler });
    const body = new JsonBody({ name: 'widget' });

    await shuttle.post('http://example.com/items', body);
    let request = lastRequest(handler);
    expect(request.getMethod()).toBe('POST');
    expect(request.getBody()).toBe(body);
    expect(request.getHeaderLine('Content-Type')).toBe('application/json');

    await shuttle.put('http://example.com/items/1', new BufferBody('x'), {
      headers: { 'Content-Type': 'text/markdown' },
    });
    request = lastRequest(handler);
    expect(request.getHeader('content-type')).toEqual(['text/markdown']);

    await shuttle.patch('http://example.com/items/1', new BufferStream('raw'));
    request = lastRequest(handler);
    expect(request.hasHeader('Content-Type')).toBe(false);
  });

  it('sends every request with the configured protocol version', async () => {
    const handler = echoTransport();
    const shuttle = new Shuttle({ handler, httpVersion: 2 });

    await shuttle.head('http://example.com/');
    await shuttle.options('http://example.com/');

    const requests = handler.getRequests();
    expect(requests.map((r) => r.getMethod())).toEqual(['HEAD', 'OPTIONS']);
    expect(requests.map((r) => r.getProtocolVersion())).toEqual(['2', '2']);
  });

  it('returns error statuses as responses', async () => {
    const handler = new ScriptedTransport([new Response(404, 'missing')]);
    const response = await new Shuttle({ handler }).delete(
      'http://example.com/items/9'
    );

    expect(response.getStatusCode()).toBe(404);
    expect(response.isSuccessful()).toBe(false);
    expect(await response.text()).toBe('missing');
  });

  it('runs middleware around the transport', async () => {
    const handler = echoTransport();
    const stamp: Middleware = {
      process: async (request, next) => {
        const response = await next(request.withHeader('X-Stamp', 'yes'));
        return response.withHeader('X-Seen', 'yes');
      },
    };
    const shuttle = new Shuttle({ handler, middleware: [stamp] });

    const response = await shuttle.get('http://example.com/');

    expect(lastRequest(handler).getHeaderLine('X-Stamp')).toBe('yes');
    expect(response.getHeaderLine('X-Seen')).toBe('yes');
  });

  it('propagates middleware and transport errors unchanged', async () => {
    const boom = new Error('boom');
    const failing: Middleware = {
      process: async () => {
        throw boom;
      },
    };
    const guarded = new Shuttle({
      handler: echoTransport(),
      middleware: [failing],
    });
    await expect(guarded.get('http://example.com/')).rejects.toBe(boom);

    const transportError = new TransportError('connection refused', {
      code: 'ECONNREFUSED',
    });
    const handler = new ScriptedTransport([
      () => {
        throw transportError;
      },
    ]);
    await expect(
      new Shuttle({ handler }).get('http://example.com/')
    ).rejects.toBe(transportError);
  });

  it('rejects an invalid handler at construction', () => {
    const handler = 'NotAHandler' as unknown as Transport;
    expect(() => new Shuttle({ handler })).toThrow(ConfigurationError);
  });

  it('rejects non-middleware entries at construction', () => {
    const middleware = [{} as unknown as Middleware];
    expect(() => new Shuttle({ middleware })).toThrow(ConfigurationError);
  });

  it('rejects an unknown protocol version at construction', () => {
    expect(
      () => new Shuttle({ handler: echoTransport(), httpVersion: '3' })
    ).toThrow(UnknownVersionError);
  });

  it('enables transport debug from the option or the environment', () => {
    const explicit = new ScriptedTransport();
    new Shuttle({ handler: explicit, debug: true });
    expect(explicit.isDebug()).toBe(true);

    vi.stubEnv('SHUTTLE_DEBUG', '1');
    const fromEnv = new ScriptedTransport();
    new Shuttle({ handler: fromEnv });
    expect(fromEnv.isDebug()).toBe(true);

    const quiet = new ScriptedTransport();
    new Shuttle({ handler: quiet, debug: false });
    expect(quiet.isDebug()).toBe(false);
  });

  it('builds a network transport when no handler is given', () => {
    const shuttle = new Shuttle();
    expect(shuttle.getHandler()).toBeInstanceOf(NetworkTransport);
  });

  it('sends pre-built requests through the same pipeline', async () => {
    const handler = echoTransport();
    const shuttle = new Shuttle({
      handler,
      baseUrl: 'https://ignored.example.com',
    });

    await shuttle.sendRequest(new Request('GET', 'http://example.com/direct'));

    expect(lastRequest(handler).getTarget()).toBe('http://example.com/direct');
    expect(lastRequest(handler).hasHeader('User-Agent')).toBe(false);
  });
});

describe('Shuttle with a scripted transport', () => {
  it('returns queued responses to get and post', async () => {
    const handler = new ScriptedTransport([
      new Response(200, 'OK', { 'Content-Type': 'text/plain' }),
      new Response(201, 'created'),
    ]);
    const shuttle = new Shuttle({ handler });

    const first = await shuttle.get('http://example.com');
    expect(first.getStatusCode()).toBe(200);
    expect(await first.text()).toBe('OK');
    expect(first.getHeaderLine('Content-Type')).toBe('text/plain');

    const body = new BufferBody('foo');
    const second = await shuttle.post('http://example.com', body);
    expect(second.getStatusCode()).toBe(201);
    expect((await body.read()).toString()).toBe('foo');
  });

  it('fails once the queue is empty', async () => {
    const shuttle = new Shuttle({ handler: new ScriptedTransport() });

    await expect(shuttle.get('http://example.com')).rejects.toBeInstanceOf(
      QueueExhaustedError
    );
  });

  it('returns the response of a short-circuiting layer without reaching the transport', async () => {
    const handler = new ScriptedTransport([new Response(200)]);
    const execute = vi.spyOn(handler, 'execute');
    const logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const requireAuth: Middleware = {
      process: async (request, next) =>
        request.hasHeader('Authorization')
          ? next(request)
          : new Response(401, 'missing credentials'),
    };
    const shuttle = new Shuttle({
      handler,
      middleware: [createLoggingMiddleware({ logger }), requireAuth],
    });

    const response = await shuttle.get('http://example.com/private');

    expect(response.getStatusCode()).toBe(401);
    expect(await response.text()).toBe('missing credentials');
    expect(execute).not.toHaveBeenCalled();
    expect(handler.remaining()).toBe(1);
    expect(logger.info).toHaveBeenCalledWith(
      'shuttle.request.complete',
      expect.objectContaining({ status: 401 })
    );
  });
});
