import type { BatchCacheStats } from "./batch-cache"
import type { Key } from "./key"

export type ViewMode = "exact" | "group"

/** Installs staged entries; returns how many were installed. */
export type PrimeCommit = () => number

/** Anything a registry can broadcast query results into. */
export interface Primeable<R> {
  primeMany(records: readonly R[]): number
}

export interface RegisteredView<R> extends Primeable<R> {
  readonly name: string
  readonly mode: ViewMode

  /**
   * `primeMany` split in two: keys are extracted now and installed on commit,
   * so a throwing extractor fails before any view is written.
   */
  stagePrime(records: readonly R[]): PrimeCommit
}

export interface View<K extends Key, R, V> extends RegisteredView<R> {
  load(key: K): Promise<V>
  loadMany(keys: readonly K[]): Promise<V[]>
  stats(): BatchCacheStats
}

/** A query as seen by a view's load function; it runs on the owning registry. */
export type BoundQuery<A extends unknown[], R> = (...args: A) => Promise<R[]>

/** Loads the records for a view's missing keys, usually by calling `query`. */
export type ViewLoadFn<A extends unknown[], R, K extends Key> = (
  keys: readonly K[],
  query: BoundQuery<A, R>,
) => Promise<readonly R[]>
