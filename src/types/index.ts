/**
 * Core types for the prefvault value model and persistence results.
 */

export type ValueKind = 'bool' | 'string' | 'stringList' | 'boolMap' | 'blob';

/**
 * Plain TypeScript value carried by each kind.
 * Blobs are opaque bytes; they are written to the document as base64.
 */
export interface ValueTypes {
  bool: boolean;
  string: string;
  stringList: string[];
  boolMap: Record<string, boolean>;
  blob: Uint8Array;
}

export type ValueOf<K extends ValueKind> = ValueTypes[K];

/**
 * Tagged variant stored in memory. Exactly one variant per entry.
 */
export type PrefValue = {
  [K in ValueKind]: { kind: K; value: ValueTypes[K] };
}[ValueKind];

/**
 * Stable key identifier with a fixed semantic type.
 */
export interface PrefKey<K extends ValueKind = ValueKind> {
  readonly name: string;
  readonly kind: K;
}

/**
 * JSON-compatible primitive as it appears in the flat durable document.
 */
export type RawValue = boolean | string | string[] | Record<string, boolean>;

export type RawDocument = Record<string, RawValue>;

export type PrefEntries = Map<string, PrefValue>;

/**
 * - `'critical'`: persisted before the call resolves; cancels any pending deferred write.
 * - `'deferred'` (default): coalesced into a single write after the debounce window.
 */
export type WritePriority = 'critical' | 'deferred';

export type WriteTrigger = 'critical' | 'deferred' | 'flush' | 'migration';

export interface WriteEvent {
  trigger: WriteTrigger;
  success: boolean;
  error?: Error;
}

export type Success<T> = { success: true; data: T; error: null };
export type Failure<E = Error> = { success: false; data: null; error: E };
export type Result<T, E = Error> = Success<T> | Failure<E>;
