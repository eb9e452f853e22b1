/**
 * Map each value of an object, keeping its keys
 */
export function mapValues<T, R>(obj: Record<string, T>, iteratee: (value: T, key: string) => R): Record<string, R> {
  const output: Record<string, R> = {};
  for (const [key, value] of Object.entries(obj)) {
    output[key] = iteratee(value, key);
  }
  return output;
}

export function isEmptyObject(value: unknown): boolean {
  return value != null && typeof value === "object" && Object.keys(value).length === 0;
}
