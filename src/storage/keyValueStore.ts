/**
 * Key-Value Store
 *
 * Synchronous in-memory map that knows how to encode its values for a
 * durable snapshot and restore them with `load`. Writes are single-step: a
 * value is encoded and size-checked before the map is touched, so a refused
 * write leaves the previous value in place.
 */

import { Result, StorageFailure, ok, err } from '../types/result';

export type EncodedValue = { [field: string]: string | number | null };

export interface StoreEntry {
  key: string;
  value: EncodedValue;
}

export interface Codec<V> {
  encode(value: V): EncodedValue;
  decode(raw: EncodedValue): V;
}

/**
 * What the persistence layer needs from a store
 */
export interface SnapshotSource {
  readonly name: string;
  snapshot(): StoreEntry[];
  load(entries: StoreEntry[]): void;
  onChange(listener: () => void): void;
}

export interface KeyValueStoreOptions {
  /** Refuse values whose JSON encoding is larger than this many bytes */
  maxValueBytes?: number;
}

export class KeyValueStore<V> implements SnapshotSource {
  private readonly entries = new Map<string, V>();
  private readonly listeners: Array<() => void> = [];

  constructor(
    readonly name: string,
    private readonly codec: Codec<V>,
    private readonly options: KeyValueStoreOptions = {}
  ) {}

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  set(key: string, value: V): Result<void, StorageFailure> {
    const encoded = this.codec.encode(value);
    const bytes = Buffer.byteLength(JSON.stringify(encoded), 'utf8');
    const limit = this.options.maxValueBytes;

    if (limit !== undefined && bytes > limit) {
      return err({
        kind: 'Storage',
        message: `${this.name}: value for "${key}" is ${bytes} bytes, limit is ${limit}`,
      });
    }

    this.entries.set(key, value);
    this.notify();
    return ok(undefined);
  }

  /**
   * Values ordered by key
   */
  values(): V[] {
    return this.sortedEntries().map(([, value]) => value);
  }

  /**
   * Values whose key starts with the given prefix, ordered by key
   */
  valuesWithPrefix(prefix: string): V[] {
    return this.sortedEntries()
      .filter(([key]) => key.startsWith(prefix))
      .map(([, value]) => value);
  }

  snapshot(): StoreEntry[] {
    return this.sortedEntries().map(([key, value]) => ({
      key,
      value: this.codec.encode(value),
    }));
  }

  /**
   * Replace the whole content with decoded snapshot entries
   */
  load(entries: StoreEntry[]): void {
    const decoded = entries.map((entry) => [entry.key, this.codec.decode(entry.value)] as const);
    this.entries.clear();
    for (const [key, value] of decoded) {
      this.entries.set(key, value);
    }
  }

  onChange(listener: () => void): void {
    this.listeners.push(listener);
  }

  private sortedEntries(): Array<[string, V]> {
    return [...this.entries.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}

// =============================================================================
// DECODING HELPERS
// =============================================================================

export const readString = (raw: EncodedValue, field: string): string => {
  const value = raw[field];
  if (typeof value !== 'string') {
    throw new Error(`Malformed stored value: "${field}" must be a string`);
  }
  return value;
};

export const readAmount = (raw: EncodedValue, field: string): bigint => {
  const value = readString(raw, field);
  if (!/^\d+$/.test(value)) {
    throw new Error(`Malformed stored value: "${field}" must be a non-negative integer`);
  }
  return BigInt(value);
};

export const readOptionalNumber = (raw: EncodedValue, field: string): number | undefined => {
  const value = raw[field];
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new Error(`Malformed stored value: "${field}" must be a number`);
  }
  return value;
};

export const readOptionalString = (raw: EncodedValue, field: string): string | undefined => {
  const value = raw[field];
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`Malformed stored value: "${field}" must be a string`);
  }
  return value;
};
