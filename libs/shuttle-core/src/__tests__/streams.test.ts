import { existsSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { BufferBody, FormBody, isBody, JsonBody } from '../body';
import { BufferStream } from '../stream/BufferStream';
import { DEFAULT_MAX_MEMORY, TempStream } from '../stream/TempStream';

describe('BufferStream', () => {
  it('reads from a cursor and rewinds', async () => {
    const stream = new BufferStream('hello');
    await stream.write(' world');

    expect((await stream.read(5)).toString()).toBe('hello');
    expect((await stream.read()).toString()).toBe(' world');
    expect((await stream.read()).length).toBe(0);

    stream.rewind();
    expect((await stream.getContents()).toString()).toBe('hello world');
    expect(stream.getSize()).toBe(11);
    expect(stream.isSeekable()).toBe(true);
  });
});

describe('TempStream', () => {
  it('uses a 2 MiB threshold by default', () => {
    expect(DEFAULT_MAX_MEMORY).toBe(2_097_152);
    expect(new TempStream().getMaxMemory()).toBe(DEFAULT_MAX_MEMORY);
  });

  it('stays in memory up to the threshold', async () => {
    const stream = new TempStream(4);
    await stream.write('abcd');

    expect(stream.isSpilled()).toBe(false);
    expect(stream.getPath()).toBeUndefined();
    expect((await stream.getContents()).toString()).toBe('abcd');
  });

  it('moves to an unlinked temp file once the threshold is crossed', async () => {
    const stream = new TempStream(4);
    await stream.write('ab');
    await stream.write('cde');

    const path = stream.getPath();
    expect(stream.isSpilled()).toBe(true);
    expect(path).toBeDefined();
    expect(path !== undefined && existsSync(path)).toBe(false);
    expect(stream.getSize()).toBe(5);
    expect((await stream.getContents()).toString()).toBe('abcde');

    stream.rewind();
    expect((await stream.read(3)).toString()).toBe('abc');
    expect((await stream.read()).toString()).toBe('de');

    await stream.close();
    expect(stream.isSpilled()).toBe(false);
    expect(stream.getSize()).toBe(0);
  });

  it('rejects an invalid threshold', () => {
    expect(() => new TempStream(-1)).toThrow(RangeError);
    expect(() => new TempStream(1.5)).toThrow(RangeError);
  });
});

describe('bodies', () => {
  it('declares content types', async () => {
    const text = new BufferBody('plain');
    const json = new JsonBody({ a: 1, b: [true] });
    const form = new FormBody({ q: 'a b', n: 1, skip: undefined });

    expect(text.getContentType()).toBe('text/plain');
    expect(json.getContentType()).toBe('application/json');
    expect(form.getContentType()).toBe('application/x-www-form-urlencoded');
    expect((await json.getContents()).toString()).toBe('{"a":1,"b":[true]}');
    expect((await form.getContents()).toString()).toBe('q=a+b&n=1');
  });

  it('tells bodies from plain streams', () => {
    expect(isBody(new JsonBody(null))).toBe(true);
    expect(isBody(new BufferStream('x'))).toBe(false);
  });
});
