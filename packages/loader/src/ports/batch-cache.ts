import type { Key } from "./key"

/**
 * - "idle": nothing pending
 * - "collecting": a window is accepting keys or waiting for its dispatch
 * - "dispatching": a fetch is in flight and no window is collecting
 */
export type BatchCacheState = "idle" | "collecting" | "dispatching"

export type BatchCacheStats = Readonly<{
  /** Loads answered from a resolved entry */
  hits: number
  /** Loads that waited on a fetch, including ones joining a pending key */
  misses: number
  dispatches: number
  /** Dispatches whose fetch or reconciliation failed */
  failures: number
  /** Entries installed by priming */
  primed: number
}>

/**
 * A per-scope cache that coalesces individual key loads into batched fetches.
 *
 * @example
 * ```ts
 * const users = createBatchLoader((ids: readonly number[]) => db.usersByIds(ids))
 *
 * // one fetch with [1, 2]
 * const [a, b, again] = await Promise.all([users.load(1), users.load(2), users.load(1)])
 * ```
 */
export interface BatchCache<K extends Key, V> {
  load(key: K): Promise<V>

  /** Loads every key; repeated keys share one pending request. */
  loadMany(keys: readonly K[]): Promise<V[]>

  /**
   * Installs `value` for `key` without fetching, unless `key` is already
   * resolved or pending. `null` and `undefined` are never installed.
   *
   * @returns whether the entry was installed
   */
  prime(key: K, value: V): boolean

  /**
   * Primes every non-absent value under `keyOf(value)`.
   *
   * @returns how many entries were installed
   */
  primeMany(values: readonly V[], keyOf: (value: NonNullable<V>) => K): number

  /** Primes pairs whose keys are already extracted. */
  primeEntries(entries: Iterable<readonly [K, V]>): number

  readonly name: string
  readonly state: BatchCacheState

  /** Number of resolved entries. */
  readonly size: number

  stats(): BatchCacheStats
}
