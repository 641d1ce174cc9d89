import superjson from "superjson"
import type { Key } from "../../ports/key"

function normalizeKey(key: Key): Key {
  if (typeof key === "number") return key === 0 ? 0 : key
  if (typeof key !== "object" || key instanceof Date) return key

  return key.map(normalizeKey)
}

/**
 * Type-tagged key identity: `1`, `"1"` and `1n` differ, while dates with the
 * same instant and tuples with equal elements collide. `-0` is the same key
 * as `0`, as under `===`.
 */
export function defaultCacheKey(key: Key): string {
  return superjson.stringify(normalizeKey(key))
}
