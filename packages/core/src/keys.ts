export type QueryKey =
  | string
  | readonly unknown[]
  | { readonly [field: string]: unknown };

/**
 * Serialize a query key to the string the cache looks it up by.
 *
 * Strings are used as they are. Anything else is JSON with object fields
 * sorted at every depth, so `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` are the
 * same key.
 */
export function encodeKey(key: QueryKey): string {
  if (typeof key === "string") return key;
  return JSON.stringify(key, sortFields);
}

/**
 * Check if a key equals `prefix`, or is an array key starting with the
 * elements of an array `prefix`. Used for prefix-based invalidation.
 */
export function keyMatchesPrefix(key: QueryKey, prefix: QueryKey): boolean {
  if (encodeKey(key) === encodeKey(prefix)) return true;
  if (!isKeyArray(key) || !isKeyArray(prefix)) return false;
  if (prefix.length > key.length) return false;
  return prefix.every((part, i) => encodeKey([part]) === encodeKey([key[i]]));
}

function isKeyArray(key: QueryKey): key is readonly unknown[] {
  return Array.isArray(key);
}

function sortFields(_field: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
}
