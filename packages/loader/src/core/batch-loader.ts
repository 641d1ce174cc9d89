import type { BatchCache } from "../ports/batch-cache"
import type { Key } from "../ports/key"
import type { LoaderOptions } from "../ports/options"
import { CoalescingBatchCache } from "./batch-cache"
import { matchOrdered } from "./reconcile/match-ordered"

/**
 * A standalone coalescing loader for fetches that already return one value
 * per key, in key order.
 *
 * @example
 * ```ts
 * const titles = createBatchLoader(async (ids: readonly number[]) => {
 *   const rows = await store.titles(ids)
 *   return ids.map((id) => rows.get(id) ?? null)
 * }, { name: "titles" })
 * ```
 */
export function createBatchLoader<K extends Key, V>(
  fetch: (keys: readonly K[]) => Promise<readonly V[]>,
  options: LoaderOptions<K> = {},
): BatchCache<K, V> {
  const name = options.name ?? "batch-loader"

  return new CoalescingBatchCache<K, V>({
    ...options,
    name,
    fetch,
    reconcile: (keys, values) => matchOrdered(keys, values, name),
  })
}
