/**
 * InMemoryStore and KeyRegistry tests
 *
 * Covers:
 * - InMemoryStore: get/set/delete/keys, null removal, copy-on-read
 * - InMemoryStore: snapshot/restore isolation
 * - KeyRegistry: kind conflicts, idempotent registration
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { KeyConflictError } from '../src/errors';
import { defineKey, KeyRegistry } from '../src/modules/keys';
import { tag } from '../src/modules/values';
import { InMemoryStore } from '../src/stores/InMemoryStore';

// ─── InMemoryStore ─────────────────────────────────────────────────────────

describe('InMemoryStore', () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = new InMemoryStore();
  });

  it('returns undefined for unknown keys', () => {
    expect(store.get('missing')).toBeUndefined();
  });

  it('set and get a value', () => {
    store.set('theme', tag('string', 'dark'));
    expect(store.get('theme')).toEqual({ kind: 'string', value: 'dark' });
  });

  it('overwrites an existing key', () => {
    store.set('k', tag('bool', true));
    store.set('k', tag('bool', false));
    expect(store.get('k')).toEqual({ kind: 'bool', value: false });
  });

  it('setting null removes the entry', () => {
    store.set('k', tag('bool', true));
    store.set('k', null);
    expect(store.has('k')).toBe(false);
    expect(store.size).toBe(0);
  });

  it('setting null on an absent key is a no-op', () => {
    expect(() => store.set('nothing', null)).not.toThrow();
    expect(store.size).toBe(0);
  });

  it('delete reports whether the key existed', () => {
    store.set('x', tag('string', 'data'));
    expect(store.delete('x')).toBe(true);
    expect(store.delete('x')).toBe(false);
  });

  it('keys returns all current keys', () => {
    store.set('a', tag('bool', true));
    store.set('b', tag('bool', true));
    store.set('c', tag('bool', true));
    store.delete('a');
    expect(store.keys().sort()).toEqual(['b', 'c']);
  });

  it('returned values are copies', () => {
    store.set('list', tag('stringList', ['a']));
    const entry = store.get('list');
    if (entry?.kind === 'stringList') entry.value.push('b');
    expect(store.get('list')).toEqual({ kind: 'stringList', value: ['a'] });
  });

  it('snapshot is isolated from later writes', () => {
    store.set('k', tag('string', 'before'));
    const snap = store.snapshot();
    store.set('k', tag('string', 'after'));
    store.set('extra', tag('bool', true));
    expect(snap.get('k')).toEqual({ kind: 'string', value: 'before' });
    expect(snap.has('extra')).toBe(false);
  });

  it('restore replaces the whole store', () => {
    store.set('k1', tag('string', 'v1'));
    const snap = store.snapshot();
    store.set('k1', tag('string', 'changed'));
    store.set('k2', tag('string', 'new'));

    store.restore(snap);

    expect(store.get('k1')).toEqual({ kind: 'string', value: 'v1' });
    expect(store.get('k2')).toBeUndefined();
  });
});

// ─── KeyRegistry ───────────────────────────────────────────────────────────

describe('KeyRegistry', () => {
  it('reports the kind of registered keys', () => {
    const registry = new KeyRegistry([defineKey('a', 'bool'), defineKey('b', 'blob')]);
    expect(registry.kindOf('a')).toBe('bool');
    expect(registry.kindOf('b')).toBe('blob');
    expect(registry.kindOf('c')).toBeUndefined();
  });

  it('accepts the same definition twice', () => {
    const registry = new KeyRegistry();
    registry.register(defineKey('a', 'string'));
    registry.register(defineKey('a', 'string'));
    expect(registry.list()).toHaveLength(1);
  });

  it('rejects redefining a key with another kind', () => {
    const registry = new KeyRegistry([defineKey('a', 'string')]);
    expect(() => registry.register(defineKey('a', 'bool'))).toThrow(KeyConflictError);
  });

  it('defineKey returns a frozen key', () => {
    const key = defineKey('a', 'bool');
    expect(Object.isFrozen(key)).toBe(true);
  });
});
