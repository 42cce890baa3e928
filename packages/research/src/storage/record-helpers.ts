/** True when every set filter field equals the record's field; `undefined` and `""` filter nothing */
export function matchesFilter<T extends object>(record: T, filter: Partial<Record<keyof T, unknown>>): boolean {
  for (const [field, expected] of Object.entries(filter)) {
    if (expected === undefined || expected === "") continue;
    if (Reflect.get(record, field) !== expected) return false;
  }
  return true;
}

/** Drops keys whose value is `undefined` so a patch never clears a field by omission */
export function definedFields<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch)) {
    const value = Reflect.get(patch, key);
    if (value !== undefined) Reflect.set(result, key, value);
  }
  return result;
}
