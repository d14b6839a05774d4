export type Callback<T> = (value: T) => void;

/**
 * Key a registry hands out for each stored callback. Keys count up from 1 and
 * are never reissued, so a stale key can only ever miss.
 */
export type CallbackKey = number;

export type CallbackEntry<T> = readonly [key: CallbackKey, callback: Callback<T>];

/**
 * Ordered store of callbacks keyed by registration. Removing an entry leaves
 * the order of the others untouched.
 */
export class CallbackRegistry<T> {
  private entries = new Map<CallbackKey, Callback<T>>();
  private nextKey: CallbackKey = 1;

  add(callback: Callback<T>): CallbackKey {
    const key = this.nextKey++;
    this.entries.set(key, callback);
    return key;
  }

  remove(key: CallbackKey): boolean {
    return this.entries.delete(key);
  }

  has(key: CallbackKey): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): CallbackKey[] {
    return [...this.entries.keys()];
  }

  /**
   * Copy of the current entries in registration order. Later edits to the
   * registry do not show up in it.
   */
  snapshot(): CallbackEntry<T>[] {
    return [...this.entries.entries()];
  }

  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }
}
