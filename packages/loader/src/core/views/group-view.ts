import type { Logger } from "@prism/logger"
import type { BatchCacheStats } from "../../ports/batch-cache"
import type { BatchFetchFn } from "../../ports/batch-fetch"
import type { BatchScheduler } from "../../ports/batch-scheduler"
import type { CacheKeyFn, Key, KeyExtractor, SortExtractor } from "../../ports/key"
import type { PrimeCommit, View } from "../../ports/view"
import { CoalescingBatchCache } from "../batch-cache"
import { defaultCacheKey } from "../keys/cache-key"
import { groupBy } from "../reconcile/group-by"

export type GroupViewDeps<K extends Key, R> = {
  name: string
  key: KeyExtractor<R, K>
  sort: SortExtractor<R>
  fetch: BatchFetchFn<K, R>
  logger: Logger
  scheduler: BatchScheduler | undefined
  maxBatchSize: number | undefined
  cacheKeyFn: CacheKeyFn<K> | undefined
}

/** Zero or more records per key, ordered by the sort extractor. */
export class GroupView<K extends Key, R> implements View<K, R, R[]> {
  readonly mode = "group"
  readonly name: string

  private readonly cache: CoalescingBatchCache<K, R[], R>

  constructor(deps: GroupViewDeps<K, R>) {
    const cacheKeyFn = deps.cacheKeyFn ?? defaultCacheKey

    this.name = deps.name
    this.cache = new CoalescingBatchCache<K, R[], R>({
      name: deps.name,
      fetch: deps.fetch,
      reconcile: (keys, records) => groupBy(keys, records, deps.key, deps.sort, cacheKeyFn),
      logger: deps.logger,
      scheduler: deps.scheduler,
      maxBatchSize: deps.maxBatchSize,
      cacheKeyFn,
    })
  }

  load(key: K): Promise<R[]> {
    return this.cache.load(key)
  }

  loadMany(keys: readonly K[]): Promise<R[][]> {
    return this.cache.loadMany(keys)
  }

  /**
   * Never primes. Records seen by another view may be only part of a group,
   * and caching them would under-return that group.
   */
  primeMany(): number {
    return 0
  }

  stagePrime(): PrimeCommit {
    return () => 0
  }

  stats(): BatchCacheStats {
    return this.cache.stats()
  }
}
