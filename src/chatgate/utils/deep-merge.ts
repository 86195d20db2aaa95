export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Merges `source` into `target` in place; arrays and scalars replace, objects recurse. */
export function deepMerge<T extends object>(target: T, source: DeepPartial<T> | undefined): T {
  const targetObj = target as unknown as Record<string, unknown>;
  for (const [rawKey, value] of Object.entries(source ?? {})) {
    if (rawKey === "__proto__" || rawKey === "constructor" || rawKey === "prototype") {
      continue;
    }
    const existing = targetObj[rawKey];
    if (isPlainObject(value) && isPlainObject(existing)) {
      targetObj[rawKey] = deepMerge({ ...existing }, value);
    } else if (value !== undefined) {
      targetObj[rawKey] = value;
    }
  }
  return target;
}
