import { z } from 'zod';
import type { PrefValue, RawValue, ValueKind, ValueOf, ValueTypes } from '../../types';
import { BoolRecordSchema } from '../../utils/records';

export const RawValueSchema = z.union([
  z.boolean(),
  z.string(),
  z.array(z.string()),
  BoolRecordSchema,
]);

interface ValueCodec<K extends ValueKind> {
  /** Raw document value → plain value. */
  schema: z.ZodType<ValueTypes[K], z.ZodTypeDef, unknown>;
  wrap(value: ValueTypes[K]): PrefValue;
  /** Returns a copy of the plain value, or `undefined` if the entry holds another kind. */
  unwrap(entry: PrefValue): ValueTypes[K] | undefined;
  toRaw(value: ValueTypes[K]): RawValue;
}

const codecs: { [K in ValueKind]: ValueCodec<K> } = {
  bool: {
    schema: z.boolean(),
    wrap: (value) => ({ kind: 'bool', value }),
    unwrap: (entry) => (entry.kind === 'bool' ? entry.value : undefined),
    toRaw: (value) => value,
  },
  string: {
    schema: z.string(),
    wrap: (value) => ({ kind: 'string', value }),
    unwrap: (entry) => (entry.kind === 'string' ? entry.value : undefined),
    toRaw: (value) => value,
  },
  stringList: {
    schema: z.array(z.string()),
    wrap: (value) => ({ kind: 'stringList', value: [...value] }),
    unwrap: (entry) => (entry.kind === 'stringList' ? [...entry.value] : undefined),
    toRaw: (value) => [...value],
  },
  boolMap: {
    schema: BoolRecordSchema.transform((raw) => ({ ...raw })),
    wrap: (value) => ({ kind: 'boolMap', value: { ...value } }),
    unwrap: (entry) => (entry.kind === 'boolMap' ? { ...entry.value } : undefined),
    toRaw: (value) => ({ ...value }),
  },
  blob: {
    schema: z
      .string()
      .base64()
      .transform((text) => new Uint8Array(Buffer.from(text, 'base64'))),
    wrap: (value) => ({ kind: 'blob', value: new Uint8Array(value) }),
    unwrap: (entry) => (entry.kind === 'blob' ? new Uint8Array(entry.value) : undefined),
    toRaw: (value) => Buffer.from(value).toString('base64'),
  },
};

export function tag<K extends ValueKind>(kind: K, value: ValueOf<K>): PrefValue {
  return codecs[kind].wrap(value);
}

/**
 * Returns a copy of the plain value of a tagged variant if it has the expected kind.
 */
export function untag<K extends ValueKind>(
  entry: PrefValue | undefined,
  kind: K,
): ValueOf<K> | undefined {
  return entry ? codecs[kind].unwrap(entry) : undefined;
}

export function cloneValue(entry: PrefValue): PrefValue {
  switch (entry.kind) {
    case 'bool':
      return codecs.bool.wrap(entry.value);
    case 'string':
      return codecs.string.wrap(entry.value);
    case 'stringList':
      return codecs.stringList.wrap(entry.value);
    case 'boolMap':
      return codecs.boolMap.wrap(entry.value);
    case 'blob':
      return codecs.blob.wrap(entry.value);
  }
}

export function valuesEqual(a: PrefValue | undefined, b: PrefValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  switch (a.kind) {
    case 'bool':
    case 'string':
      return a.kind === b.kind && a.value === b.value;
    case 'stringList':
      return b.kind === 'stringList' && sequenceEqual(a.value, b.value);
    case 'boolMap': {
      if (b.kind !== 'boolMap') return false;
      const left = a.value;
      const right = b.value;
      const keys = Object.keys(left);
      return (
        keys.length === Object.keys(right).length &&
        keys.every((key) => Object.hasOwn(right, key) && right[key] === left[key])
      );
    }
    case 'blob':
      return b.kind === 'blob' && sequenceEqual(a.value, b.value);
  }
}

/**
 * Encodes a tagged value into its flat document form. Blobs become base64 strings.
 */
export function toRaw(entry: PrefValue): RawValue {
  switch (entry.kind) {
    case 'bool':
      return codecs.bool.toRaw(entry.value);
    case 'string':
      return codecs.string.toRaw(entry.value);
    case 'stringList':
      return codecs.stringList.toRaw(entry.value);
    case 'boolMap':
      return codecs.boolMap.toRaw(entry.value);
    case 'blob':
      return codecs.blob.toRaw(entry.value);
  }
}

/**
 * Decodes a raw document value against a declared kind.
 * Returns `undefined` when the raw shape does not match.
 */
export function fromRaw<K extends ValueKind>(raw: unknown, kind: K): PrefValue | undefined {
  const parsed = codecs[kind].schema.safeParse(raw);
  return parsed.success ? codecs[kind].wrap(parsed.data) : undefined;
}

/**
 * Decodes a raw document value whose key has no registered kind, inferring the
 * kind from its JSON shape. Strings are never inferred as blobs.
 */
export function inferFromRaw(raw: unknown): PrefValue | undefined {
  const parsed = RawValueSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const value = parsed.data;
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (typeof value === 'string') return { kind: 'string', value };
  if (Array.isArray(value)) return { kind: 'stringList', value: [...value] };
  return { kind: 'boolMap', value: { ...value } };
}

/**
 * Encodes a JSON-compatible payload as UTF-8 JSON bytes.
 */
export function encodePayload(payload: unknown): Uint8Array {
  return new Uint8Array(Buffer.from(JSON.stringify(payload), 'utf8'));
}

/**
 * Decodes bytes produced by {@link encodePayload}. Throws on malformed JSON.
 */
export function decodePayload(bytes: Uint8Array): unknown {
  return JSON.parse(Buffer.from(bytes).toString('utf8'));
}

function sequenceEqual<T>(left: ArrayLike<T>, right: ArrayLike<T>): boolean {
  if (left.length !== right.length) return false;
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
}
