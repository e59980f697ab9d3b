import {
  canonicalJson,
  cloneJson,
  isJsonObject,
  ownEntry,
  setEntry,
  type JsonObject,
  type JsonValue,
} from '../storage/json.js';

/**
 * Apply a JSON merge patch (RFC 7396). Objects merge recursively, `null`
 * removes the key, any other value replaces it. Inputs are not mutated.
 */
export function applyMergePatch(target: JsonValue, patch: JsonValue): JsonValue {
  if (!isJsonObject(patch)) return cloneJson(patch);

  const result: JsonObject = isJsonObject(target) ? cloneJson(target) : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      setEntry(result, key, applyMergePatch(ownEntry(result, key) ?? null, value));
    }
  }
  return result;
}

/**
 * Smallest merge patch turning `from` into `to`.
 */
export function createMergePatch(from: JsonObject, to: JsonObject): JsonObject {
  const patch: JsonObject = {};
  for (const key of Object.keys(from)) {
    if (!Object.hasOwn(to, key)) setEntry(patch, key, null);
  }
  for (const [key, value] of Object.entries(to)) {
    const previous = ownEntry(from, key);
    if (previous === undefined) {
      setEntry(patch, key, cloneJson(value));
    } else if (isJsonObject(previous) && isJsonObject(value)) {
      const nested = createMergePatch(previous, value);
      if (Object.keys(nested).length > 0) setEntry(patch, key, nested);
    } else if (canonicalJson(previous) !== canonicalJson(value)) {
      setEntry(patch, key, cloneJson(value));
    }
  }
  return patch;
}
