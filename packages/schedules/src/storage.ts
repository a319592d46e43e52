/**
 * Key-value storage collaborator.
 *
 * The repository persists schedules through this interface only, so a
 * durable backend can replace the in-memory one without touching the
 * engines. Values are stored as given; callers store immutable records.
 */

export interface KeyValueStore<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): void;
  has(key: K): boolean;
}

export class InMemoryKeyValueStore<K, V> implements KeyValueStore<K, V> {
  private readonly _data = new Map<K, V>();

  get(key: K): V | undefined {
    return this._data.get(key);
  }

  set(key: K, value: V): void {
    this._data.set(key, value);
  }

  has(key: K): boolean {
    return this._data.has(key);
  }

  get size(): number {
    return this._data.size;
  }
}
