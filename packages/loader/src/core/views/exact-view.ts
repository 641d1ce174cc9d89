import type { Logger } from "@prism/logger"
import type { BatchCacheStats } from "../../ports/batch-cache"
import type { BatchFetchFn } from "../../ports/batch-fetch"
import type { BatchScheduler } from "../../ports/batch-scheduler"
import type { CacheKeyFn, Key, KeyExtractor } from "../../ports/key"
import type { PrimeCommit, View } from "../../ports/view"
import { CoalescingBatchCache } from "../batch-cache"
import { defaultCacheKey } from "../keys/cache-key"
import { matchExact } from "../reconcile/match-exact"

export type ExactViewDeps<K extends Key, R> = {
  name: string
  key: KeyExtractor<R, K>
  fetch: BatchFetchFn<K, R>
  logger: Logger
  scheduler: BatchScheduler | undefined
  maxBatchSize: number | undefined
  cacheKeyFn: CacheKeyFn<K> | undefined
}

/** At most one record per key; `null` when the source has none. */
export class ExactView<K extends Key, R> implements View<K, R, R | null> {
  readonly mode = "exact"
  readonly name: string

  private readonly cache: CoalescingBatchCache<K, R | null, R>
  private readonly keyOf: KeyExtractor<R, K>

  constructor(deps: ExactViewDeps<K, R>) {
    const cacheKeyFn = deps.cacheKeyFn ?? defaultCacheKey

    this.name = deps.name
    this.keyOf = deps.key
    this.cache = new CoalescingBatchCache<K, R | null, R>({
      name: deps.name,
      fetch: deps.fetch,
      reconcile: (keys, records) => matchExact(keys, records, deps.key, cacheKeyFn),
      logger: deps.logger,
      scheduler: deps.scheduler,
      maxBatchSize: deps.maxBatchSize,
      cacheKeyFn,
    })
  }

  load(key: K): Promise<R | null> {
    return this.cache.load(key)
  }

  loadMany(keys: readonly K[]): Promise<(R | null)[]> {
    return this.cache.loadMany(keys)
  }

  primeMany(records: readonly R[]): number {
    return this.stagePrime(records)()
  }

  stagePrime(records: readonly R[]): PrimeCommit {
    const entries: [K, R][] = []

    for (const record of records) {
      if (record === null || record === undefined) continue
      entries.push([this.keyOf(record), record])
    }

    return () => this.cache.primeEntries(entries)
  }

  stats(): BatchCacheStats {
    return this.cache.stats()
  }
}
