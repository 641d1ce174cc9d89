import type { CacheKeyFn, Key, KeyExtractor } from "../../ports/key"
import { defaultCacheKey } from "../keys/cache-key"

/**
 * Aligns `values` onto `keys`, one record or `null` per key. When several
 * values share a key the last one wins.
 */
export function matchExact<K extends Key, R>(
  keys: readonly K[],
  values: readonly R[],
  keyOf: KeyExtractor<R, K>,
  cacheKey: CacheKeyFn<K> = defaultCacheKey,
): (R | null)[] {
  const byKey = new Map<string, R>()

  for (const value of values) {
    byKey.set(cacheKey(keyOf(value)), value)
  }

  return keys.map((key) => byKey.get(cacheKey(key)) ?? null)
}
