export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `push_notifications` → `pushNotifications`; camelCase keys pass through. */
export function toCamelKey(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

/**
 * Rewrite one object level onto the canonical camelCase key set.
 *
 * Only the keys of `value` itself are touched: nested objects belong to
 * other entities (which canonicalize their own level) or are free-form
 * payloads such as `metadata` and `data`, which are never rewritten.
 * When both spellings of a key are present the camelCase one wins.
 * Non-objects are returned unchanged so the schema can report them.
 */
export function canonicalizeKeys(value: unknown): unknown {
  if (!isPlainObject(value)) return value;

  const canonical: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const camel = toCamelKey(key);
    if (camel !== key && Object.prototype.hasOwnProperty.call(value, camel)) continue;
    canonical[camel] = entry;
  }
  return canonical;
}
