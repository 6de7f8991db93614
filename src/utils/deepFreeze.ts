/**
 * Recursively freeze a plain object graph and return it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
