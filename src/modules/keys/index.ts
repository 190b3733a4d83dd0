import { KeyConflictError } from '../../errors';
import type { PrefKey, ValueKind } from '../../types';

export function defineKey<K extends ValueKind>(name: string, kind: K): PrefKey<K> {
  return Object.freeze({ name, kind });
}

/**
 * Set of known keys. Used when decoding the document, where the flat JSON
 * shape alone cannot tell a string from a blob.
 *
 * A name keeps its kind for the lifetime of the registry; redefining it with
 * another kind throws {@link KeyConflictError}.
 */
export class KeyRegistry {
  private readonly keys = new Map<string, PrefKey>();

  constructor(keys: Iterable<PrefKey> = []) {
    for (const key of keys) this.register(key);
  }

  register<K extends ValueKind>(key: PrefKey<K>): PrefKey<K> {
    const existing = this.keys.get(key.name);
    if (existing && existing.kind !== key.kind) {
      throw new KeyConflictError(
        `Key "${key.name}" is already registered as ${existing.kind}, cannot redefine as ${key.kind}.`,
      );
    }
    if (!existing) this.keys.set(key.name, key);
    return key;
  }

  kindOf(name: string): ValueKind | undefined {
    return this.keys.get(name)?.kind;
  }

  has(name: string): boolean {
    return this.keys.has(name);
  }

  list(): PrefKey[] {
    return Array.from(this.keys.values());
  }
}
