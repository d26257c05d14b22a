/**
 * Deep copy of a JSON-shaped value, frozen at every level. Entities keep
 * these so nothing the caller still holds can reach their state.
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

/** Fresh, mutable deep copy for a projection handed to the caller. */
export function projectedCopy<T>(value: T): T {
  return structuredClone(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const entry of Object.values(value)) deepFreeze(entry);
    Object.freeze(value);
  }
  return value;
}
