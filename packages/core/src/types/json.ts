/**
 * @fileoverview JSON value types
 *
 * Every state tree, diff payload and tool result that crosses a persistence
 * boundary is expressed in these types.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

/**
 * Type guard for plain JSON mappings (arrays and null excluded)
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce an arbitrary runtime value (e.g. a tool result) into JSON.
 *
 * Dates become ISO strings, undefined object members are dropped,
 * non-finite numbers become null and anything else unrepresentable
 * is stringified.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
  if (value instanceof Map) {
    const result: JsonObject = {};
    for (const [key, item] of value) {
      result[String(key)] = toJsonValue(item);
    }
    return result;
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        result[key] = toJsonValue(item);
      }
    }
    return result;
  }
  return String(value);
}

/**
 * Serialize with object keys sorted, so equal values produce equal strings
 */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (isJsonObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key] ?? null)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}
