import { toBuffer, type Stream, type StreamChunk } from './Stream';

export class BufferStream implements Stream {
  private buffer: Buffer;
  private cursor = 0;

  constructor(contents: StreamChunk = '') {
    this.buffer = toBuffer(contents);
  }

  async write(chunk: StreamChunk): Promise<number> {
    const bytes = toBuffer(chunk);
    this.buffer = Buffer.concat([this.buffer, bytes]);
    return bytes.length;
  }

  async read(length?: number): Promise<Buffer> {
    const total = this.buffer.length;
    const end =
      length === undefined ? total : Math.min(this.cursor + length, total);
    const slice = this.buffer.subarray(this.cursor, end);
    this.cursor = end;
    return Buffer.from(slice);
  }

  getContents(): Promise<Buffer> {
    return this.read();
  }

  rewind(): void {
    this.cursor = 0;
  }

  isSeekable(): boolean {
    return true;
  }

  getSize(): number {
    return this.buffer.length;
  }

  async close(): Promise<void> {
    this.buffer = Buffer.alloc(0);
    this.cursor = 0;
  }

  toString(): string {
    return this.buffer.toString('utf8');
  }
}
