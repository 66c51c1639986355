import { QueueExhaustedError } from '../errors';
import type { Request } from '../Request';
import type { Response } from '../Response';
import type { Transport } from '../types';

export type ResponseFactory = (
  request: Request
) => Response | Promise<Response>;

export type ScriptedEntry = Response | ResponseFactory;

/**
 * Network-free transport that replays a queue of responses in FIFO order.
 *
 * @example
 * ```typescript
 * const shuttle = new Shuttle({
 *   handler: new ScriptedTransport([
 *     new Response(200, 'OK', { 'Content-Type': 'text/plain' }),
 *     (request) => new Response(201, request.getMethod()),
 *   ]),
 * });
 * ```
 */
export class ScriptedTransport implements Transport {
  private readonly queue: ScriptedEntry[];
  private readonly received: Request[] = [];
  private debug = false;

  constructor(entries: ScriptedEntry[] = []) {
    this.queue = [...entries];
  }

  async execute(request: Request): Promise<Response> {
    const entry = this.queue.shift();
    if (entry === undefined) {
      throw new QueueExhaustedError();
    }
    this.received.push(request);
    return typeof entry === 'function' ? entry(request) : entry;
  }

  setDebug(enabled: boolean): this {
    this.debug = enabled;
    return this;
  }

  isDebug(): boolean {
    return this.debug;
  }

  append(...entries: ScriptedEntry[]): this {
    this.queue.push(...entries);
    return this;
  }

  remaining(): number {
    return this.queue.length;
  }

  /** Requests that reached this transport, oldest first. Bodies are unread. */
  getRequests(): readonly Request[] {
    return [...this.received];
  }
}
