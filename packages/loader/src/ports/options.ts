import type { Logger } from "@prism/logger"
import type { BatchFetchFn, Reconciler } from "./batch-fetch"
import type { BatchScheduler } from "./batch-scheduler"
import type { CacheKeyFn, Key, KeyExtractor, SortExtractor } from "./key"
import type { ViewLoadFn } from "./view"

export type LoaderOptions<K extends Key> = {
  /** Used in log entries and errors. */
  name?: string | undefined
  /** @default NullLogger */
  logger?: Logger | undefined
  /** @default microtask scheduler */
  scheduler?: BatchScheduler | undefined
  /** Closes a window once it holds this many keys. Unbounded when omitted. */
  maxBatchSize?: number | undefined
  /** @default superjson encoding of the key */
  cacheKeyFn?: CacheKeyFn<K> | undefined
}

export type BatchCacheOptions<K extends Key, V, R> = LoaderOptions<K> & {
  fetch: BatchFetchFn<K, R>
  reconcile: Reconciler<K, R, V>
}

export type RegistryOptions = {
  name?: string | undefined
  logger?: Logger | undefined
  /** Shared by every view unless the view sets its own. */
  scheduler?: BatchScheduler | undefined
}

type ViewSpecBase<A extends unknown[], R, K extends Key> = {
  name?: string | undefined
  key: KeyExtractor<R, K>
  load: ViewLoadFn<A, R, K>
  scheduler?: BatchScheduler | undefined
  maxBatchSize?: number | undefined
  cacheKeyFn?: CacheKeyFn<K> | undefined
}

export type ExactViewSpec<A extends unknown[], R, K extends Key> = ViewSpecBase<A, R, K>

export type GroupViewSpec<A extends unknown[], R, K extends Key> = ViewSpecBase<A, R, K> & {
  sort: SortExtractor<R>
}
