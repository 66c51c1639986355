import type { HeaderInput, HeaderValue } from './types';

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const INVALID_VALUE = /[\r\n\0]/;

interface HeaderEntry {
  readonly name: string;
  readonly values: readonly string[];
}

function normalizeValues(name: string, value: HeaderValue): string[] {
  if (!TOKEN.test(name)) {
    throw new TypeError(`Invalid header name: "${name}"`);
  }
  const values = typeof value === 'string' ? [value] : [...value];
  for (const item of values) {
    if (INVALID_VALUE.test(item)) {
      throw new TypeError(`Invalid value for header "${name}"`);
    }
  }
  return values.map((item) => item.trim());
}

function findEntry(list: readonly HeaderEntry[], name: string): number {
  const needle = name.toLowerCase();
  return list.findIndex((entry) => entry.name.toLowerCase() === needle);
}

function appendValues(
  list: readonly HeaderEntry[],
  name: string,
  value: HeaderValue
): HeaderEntry[] {
  const values = normalizeValues(name, value);
  const index = findEntry(list, name);
  if (index === -1) {
    return [...list, { name, values }];
  }
  const next = [...list];
  next[index] = {
    name: list[index].name,
    values: [...list[index].values, ...values],
  };
  return next;
}

/**
 * Immutable header multimap.
 *
 * Names compare case-insensitively; the casing a name was first given with is
 * what `entries()` reports. Every mutator returns a new bag.
 */
export class HeaderBag {
  private list: readonly HeaderEntry[] = [];

  constructor(input?: HeaderInput | Array<[string, HeaderValue]>) {
    if (!input) return;
    const pairs = Array.isArray(input) ? input : Object.entries(input);
    let list: HeaderEntry[] = [];
    for (const [name, value] of pairs) {
      list = appendValues(list, name, value);
    }
    this.list = list;
  }

  private static of(list: readonly HeaderEntry[]): HeaderBag {
    const bag = new HeaderBag();
    bag.list = list;
    return bag;
  }

  has(name: string): boolean {
    return findEntry(this.list, name) !== -1;
  }

  get(name: string): string[] {
    const index = findEntry(this.list, name);
    return index === -1 ? [] : [...this.list[index].values];
  }

  line(name: string): string {
    return this.get(name).join(', ');
  }

  /** Replace every value of `name`. The entry keeps its position. */
  with(name: string, value: HeaderValue): HeaderBag {
    const entry: HeaderEntry = { name, values: normalizeValues(name, value) };
    const index = findEntry(this.list, name);
    if (index === -1) {
      return HeaderBag.of([...this.list, entry]);
    }
    const list = [...this.list];
    list[index] = entry;
    return HeaderBag.of(list);
  }

  withAdded(name: string, value: HeaderValue): HeaderBag {
    return HeaderBag.of(appendValues(this.list, name, value));
  }

  without(name: string): HeaderBag {
    const index = findEntry(this.list, name);
    if (index === -1) {
      return this;
    }
    return HeaderBag.of(this.list.filter((_, i) => i !== index));
  }

  get size(): number {
    return this.list.length;
  }

  *entries(): IterableIterator<[string, string[]]> {
    for (const entry of this.list) {
      yield [entry.name, [...entry.values]];
    }
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [name, values] of this.entries()) {
      record[name] = values;
    }
    return record;
  }
}
