/**
 * JSON value types plus canonical serialization.
 *
 * Canonical JSON sorts object keys recursively so that equal values always
 * serialize to the same bytes, whatever order their keys were inserted in.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Own property of a JSON object, never one inherited from Object.prototype.
 */
export function ownEntry(object: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(object, key) ? object[key] : undefined;
}

/**
 * Define `key` as a plain own property. Plain assignment of `__proto__`
 * would replace the prototype instead of storing the key.
 */
export function setEntry(object: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(object, key, { value, enumerable: true, writable: true, configurable: true });
}

export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      setEntry(sorted, key, sortKeys(value[key]));
    }
    return sorted;
  }
  return value;
}

/**
 * Parse a stored JSON column that must hold an object.
 * Empty or NULL columns read back as an empty object.
 */
export function parseJsonObject(text: string | null, column: string): JsonObject {
  if (text === null || text === '') return {};
  const parsed: unknown = JSON.parse(text);
  if (!isJsonObject(parsed)) {
    throw new TypeError(`Column ${column} does not hold a JSON object`);
  }
  return parsed;
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
