/**
 * Recursively freeze plain objects and arrays in place and return the same
 * reference. Map and Set contents are not covered; wrap those behind
 * ReadonlyMap / ReadonlySet and freeze their values instead.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
