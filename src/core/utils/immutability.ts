/**
 * Deep freeze an object and all nested objects.
 * Used for expectations and buffer payloads, which must not change once handed over.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }

  for (const key of Reflect.ownKeys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (nested !== null && (typeof nested === "object" || typeof nested === "function")) {
      deepFreeze(nested);
    }
  }

  return Object.freeze(value);
}

/**
 * Structured-clone a value and freeze the copy, so later changes to the
 * caller's object cannot leak into it.
 */
export function frozenCopy<T>(value: T): Readonly<T> {
  return deepFreeze(structuredClone(value));
}
