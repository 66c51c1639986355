import { BufferStream } from './stream/BufferStream';
import type { Stream, StreamChunk } from './stream/Stream';

/** A stream that declares the Content-Type it should be sent with. */
export interface Body extends Stream {
  getContentType(): string;
}

export function isBody(stream: Stream): stream is Body {
  return (
    'getContentType' in stream && typeof stream.getContentType === 'function'
  );
}

export class BufferBody extends BufferStream implements Body {
  constructor(
    contents: StreamChunk = '',
    private readonly contentType: string = 'text/plain'
  ) {
    super(contents);
  }

  getContentType(): string {
    return this.contentType;
  }
}

export class JsonBody extends BufferStream implements Body {
  constructor(
    value: unknown,
    private readonly contentType: string = 'application/json'
  ) {
    super(JSON.stringify(value) ?? 'null');
  }

  getContentType(): string {
    return this.contentType;
  }
}

export type FormFields = Record<string, string | number | boolean | undefined>;

export class FormBody extends BufferStream implements Body {
  constructor(fields: FormFields) {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    super(params.toString());
  }

  getContentType(): string {
    return 'application/x-www-form-urlencoded';
  }
}
