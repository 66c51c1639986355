export type StreamChunk = Uint8Array | string;

/**
 * Byte source/sink used for message bodies.
 *
 * Writes append to the end. Reads consume from a cursor, so a non-seekable
 * stream can be read once.
 */
export interface Stream {
  write(chunk: StreamChunk): Promise<number>;
  /** Read up to `length` bytes from the cursor; the rest when omitted. */
  read(length?: number): Promise<Buffer>;
  getContents(): Promise<Buffer>;
  rewind(): void;
  isSeekable(): boolean;
  /** Total bytes held, or undefined when unknown. */
  getSize(): number | undefined;
  close(): Promise<void>;
}

export function toBuffer(chunk: StreamChunk): Buffer {
  return typeof chunk === 'string'
    ? Buffer.from(chunk, 'utf8')
    : Buffer.from(chunk);
}
