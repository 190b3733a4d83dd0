import { z } from 'zod';

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isBoolRecord(value: unknown): value is Record<string, boolean> {
  return isPlainRecord(value) && Object.values(value).every((item) => typeof item === 'boolean');
}

/**
 * Validates a JSON object without rebuilding it, so keys such as `__proto__`
 * stay own properties. `z.record` copies by assignment and would drop them.
 */
export const PlainRecordSchema = z.custom<Record<string, unknown>>(isPlainRecord, {
  message: 'Expected a JSON object',
});

export const BoolRecordSchema = z.custom<Record<string, boolean>>(isBoolRecord, {
  message: 'Expected an object of booleans',
});

/** Sets `key` as an own data property, whatever its name. */
export function defineEntry<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
