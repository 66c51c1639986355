import { HeaderBag } from './HeaderBag';
import { Message, parseProtocolVersion } from './Message';
import { getReasonPhrase, isValidStatusCode } from './status';
import { BufferStream } from './stream/BufferStream';
import type { Stream } from './stream/Stream';
import type { HeaderInput, ProtocolVersion } from './types';

function assertStatusCode(code: number): void {
  if (!isValidStatusCode(code)) {
    throw new RangeError(`Invalid HTTP status code: ${code}`);
  }
}

/**
 * Immutable incoming response.
 *
 * The reason phrase falls back to the status registry when none is supplied.
 * Status code and phrase only ever change together, through `withStatus`.
 */
export class Response extends Message {
  private statusCode: number;
  private reasonPhrase: string;
  private body: Stream;

  constructor(
    statusCode = 200,
    body: Stream | string = new BufferStream(),
    headers?: HeaderInput | HeaderBag,
    version: ProtocolVersion | number | string = '1.1',
    reasonPhrase?: string
  ) {
    super(
      headers instanceof HeaderBag ? headers : new HeaderBag(headers),
      parseProtocolVersion(version)
    );
    assertStatusCode(statusCode);
    this.statusCode = statusCode;
    this.reasonPhrase = reasonPhrase ?? getReasonPhrase(statusCode);
    this.body = typeof body === 'string' ? new BufferStream(body) : body;
  }

  static make(
    statusCode = 200,
    body: Stream | string = new BufferStream(),
    headers?: HeaderInput | HeaderBag,
    version: ProtocolVersion | number | string = '1.1',
    reasonPhrase?: string
  ): Response {
    return new Response(statusCode, body, headers, version, reasonPhrase);
  }

  getStatusCode(): number {
    return this.statusCode;
  }

  getReasonPhrase(): string {
    return this.reasonPhrase;
  }

  withStatus(code: number, reasonPhrase?: string): Response {
    assertStatusCode(code);
    const phrase = reasonPhrase ?? getReasonPhrase(code);
    return this.clone((copy) => {
      copy.statusCode = code;
      copy.reasonPhrase = phrase;
    });
  }

  /** 1xx, 2xx and 3xx count as successful; 4xx and 5xx do not. */
  isSuccessful(): boolean {
    return this.statusCode >= 100 && this.statusCode < 400;
  }

  getBody(): Stream {
    return this.body;
  }

  withBody(body: Stream | string): Response {
    const stream = typeof body === 'string' ? new BufferStream(body) : body;
    return this.clone((copy) => {
      copy.body = stream;
    });
  }

  /** Read the whole body as UTF-8, rewinding first when the stream can. */
  async text(): Promise<string> {
    if (this.body.isSeekable()) {
      this.body.rewind();
    }
    const contents = await this.body.getContents();
    return contents.toString('utf8');
  }

  async json<T = unknown>(): Promise<T> {
    return JSON.parse(await this.text());
  }
}
