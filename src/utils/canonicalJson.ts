type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Deterministic JSON: object keys sorted by UTF-16 code unit at every depth,
 * two-space indentation, same layout as `JSON.stringify(value, null, 2)`.
 *
 * `JSON.stringify` alone cannot guarantee this, since integer-like keys are
 * always emitted first in numeric order.
 */
export function canonicalJson(value: JsonValue, depth = 0): string {
  const pad = '  '.repeat(depth + 1);
  const closePad = '  '.repeat(depth);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const items = value.map((item) => `${pad}${canonicalJson(item, depth + 1)}`);
    return `[\n${items.join(',\n')}\n${closePad}]`;
  }

  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    if (keys.length === 0) return '{}';
    const fields = keys.map(
      (key) => `${pad}${JSON.stringify(key)}: ${canonicalJson(value[key], depth + 1)}`,
    );
    return `{\n${fields.join(',\n')}\n${closePad}}`;
  }

  return JSON.stringify(value);
}
