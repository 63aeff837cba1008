/** Recursively freezes plain objects and arrays. RegExp and other instances are frozen shallowly. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  if (value instanceof RegExp) {
    return value;
  }
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}
