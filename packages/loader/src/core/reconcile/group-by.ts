import type { CacheKeyFn, Key, KeyExtractor, SortExtractor } from "../../ports/key"
import { defaultCacheKey } from "../keys/cache-key"
import { compareOrderable } from "../keys/compare"

/**
 * Partitions `values` by key and returns each requested key's partition,
 * stable-sorted ascending by `sortKey`. Keys without values get `[]`.
 */
export function groupBy<K extends Key, R>(
  keys: readonly K[],
  values: readonly R[],
  keyOf: KeyExtractor<R, K>,
  sortKey: SortExtractor<R>,
  cacheKey: CacheKeyFn<K> = defaultCacheKey,
): R[][] {
  const groups = new Map<string, R[]>()

  for (const value of values) {
    const id = cacheKey(keyOf(value))
    const group = groups.get(id)

    if (group) group.push(value)
    else groups.set(id, [value])
  }

  const sorted = new Map<string, R[]>()

  return keys.map((key) => {
    const id = cacheKey(key)
    const done = sorted.get(id)
    if (done) return [...done]

    const group = groups.get(id)
    if (!group) return []

    const ordered = sortStable(group, sortKey)
    sorted.set(id, ordered)

    return [...ordered]
  })
}

function sortStable<R>(records: readonly R[], sortKey: SortExtractor<R>): R[] {
  return records
    .map((record) => ({ record, by: sortKey(record) }))
    .sort((a, b) => compareOrderable(a.by, b.by))
    .map(({ record }) => record)
}
