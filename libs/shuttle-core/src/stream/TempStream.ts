import { randomUUID } from 'node:crypto';
import { open, unlink, type FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { toBuffer, type Stream, type StreamChunk } from './Stream';

export const DEFAULT_MAX_MEMORY = 2 * 1024 * 1024;

interface SpillFile {
  path: string;
  handle: FileHandle;
}

/**
 * Stream that stays resident in memory up to `maxMemory` bytes, then moves its
 * contents to a file under the OS temp directory and keeps appending there.
 *
 * The spill file is unlinked as soon as it is opened, so it never outlives the
 * stream. Its descriptor is released by `close()`.
 */
export class TempStream implements Stream {
  private memory: Buffer[] = [];
  private file?: SpillFile;
  private size = 0;
  private cursor = 0;

  constructor(private readonly maxMemory: number = DEFAULT_MAX_MEMORY) {
    if (!Number.isInteger(maxMemory) || maxMemory < 0) {
      throw new RangeError(
        `maxMemory must be a non-negative integer, got ${maxMemory}`
      );
    }
  }

  getMaxMemory(): number {
    return this.maxMemory;
  }

  isSpilled(): boolean {
    return this.file !== undefined;
  }

  /** Where the spill file was created. The name is already unlinked. */
  getPath(): string | undefined {
    return this.file?.path;
  }

  async write(chunk: StreamChunk): Promise<number> {
    const bytes = toBuffer(chunk);
    if (bytes.length === 0) return 0;

    if (!this.file && this.size + bytes.length > this.maxMemory) {
      await this.spill();
    }

    if (this.file) {
      await this.file.handle.write(bytes, 0, bytes.length, this.size);
    } else {
      this.memory.push(bytes);
    }
    this.size += bytes.length;
    return bytes.length;
  }

  async read(length?: number): Promise<Buffer> {
    const end =
      length === undefined
        ? this.size
        : Math.min(this.cursor + length, this.size);
    const count = end - this.cursor;
    if (count <= 0) return Buffer.alloc(0);

    let bytes: Buffer;
    if (this.file) {
      bytes = Buffer.alloc(count);
      const { bytesRead } = await this.file.handle.read(
        bytes,
        0,
        count,
        this.cursor
      );
      bytes = bytes.subarray(0, bytesRead);
    } else {
      const resident = Buffer.concat(this.memory);
      bytes = Buffer.from(resident.subarray(this.cursor, end));
    }
    this.cursor += bytes.length;
    return bytes;
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
    return this.size;
  }

  async close(): Promise<void> {
    const file = this.file;
    this.file = undefined;
    this.memory = [];
    this.size = 0;
    this.cursor = 0;
    if (file) {
      await file.handle.close();
    }
  }

  private async spill(): Promise<void> {
    const path = join(tmpdir(), `shuttle-${randomUUID()}.tmp`);
    const handle = await open(path, 'w+');
    try {
      await unlink(path);
    } catch (error) {
      await handle.close();
      throw error;
    }

    const resident = Buffer.concat(this.memory);
    if (resident.length > 0) {
      await handle.write(resident, 0, resident.length, 0);
    }
    this.memory = [];
    this.file = { path, handle };
  }
}
