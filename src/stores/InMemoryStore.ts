import type { PrefEntries, PrefValue } from '../types';
import { cloneValue } from '../modules/values';

/**
 * Canonical key → value map backed by a plain Map.
 *
 * Holds the most current view of every preference. Durable state may lag
 * behind it, never precede it. Values are copied on the way in and out so
 * callers cannot mutate stored collections.
 */
export class InMemoryStore {
  private store: PrefEntries = new Map();

  get(key: string): PrefValue | undefined {
    const entry = this.store.get(key);
    return entry ? cloneValue(entry) : undefined;
  }

  /** `null` removes the entry. */
  set(key: string, value: PrefValue | null): void {
    if (value === null) {
      this.store.delete(key);
      return;
    }
    this.store.set(key, cloneValue(value));
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }

  get size(): number {
    return this.store.size;
  }

  snapshot(): PrefEntries {
    const copy: PrefEntries = new Map();
    for (const [key, value] of this.store) copy.set(key, cloneValue(value));
    return copy;
  }

  restore(data: PrefEntries): void {
    this.store = new Map();
    for (const [key, value] of data) this.store.set(key, cloneValue(value));
  }
}
