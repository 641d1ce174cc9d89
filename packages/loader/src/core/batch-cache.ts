import { type Logger, NullLogger } from "@prism/logger"
import { MicrotaskScheduler } from "../adapters/microtask/microtask-scheduler"
import type { BatchCache, BatchCacheState, BatchCacheStats } from "../ports/batch-cache"
import type { BatchFetchFn, Reconciler } from "../ports/batch-fetch"
import type { BatchScheduler } from "../ports/batch-scheduler"
import type { CacheKeyFn, Key } from "../ports/key"
import type { BatchCacheOptions } from "../ports/options"
import { LoaderError } from "./errors/loader-error"
import { defaultCacheKey } from "./keys/cache-key"

type Deferred<V> = {
  promise: Promise<V>
  resolve: (value: V) => void
  reject: (reason: unknown) => void
}

type WindowEntry<K, V> = {
  key: K
  id: string
  deferred: Deferred<V>
}

type Window<K, V> = {
  entries: WindowEntry<K, V>[]
  phase: "collecting" | "dispatching"
}

function createDeferred<V>(): Deferred<V> {
  let resolve: (value: V) => void = () => {}
  let reject: (reason: unknown) => void = () => {}
  const promise = new Promise<V>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}

function now(): number {
  return performance.now()
}

/**
 * Coalesces `load` calls that arrive before the scheduler's boundary into a
 * single fetch, reconciles the records onto the requested keys and caches
 * every result for the lifetime of the instance.
 *
 * Each window dispatches exactly once. A key that is already pending joins
 * the pending request instead of entering a new window. When a dispatch
 * fails every caller of that window receives the same error, nothing is
 * cached, and the next `load` of those keys fetches again.
 *
 * Priming never touches a key that is resolved or pending, so every caller
 * of a key sees the same value.
 */
export class CoalescingBatchCache<K extends Key, V, R = V> implements BatchCache<K, V> {
  readonly name: string

  private readonly fetchFn: BatchFetchFn<K, R>
  private readonly reconcileFn: Reconciler<K, R, V>
  private readonly logger: Logger
  private readonly scheduler: BatchScheduler
  private readonly maxBatchSize: number | undefined
  private readonly cacheKeyFn: CacheKeyFn<K>

  private readonly resolved = new Map<string, { value: V }>()
  private readonly pending = new Map<string, Promise<V>>()
  private readonly windows = new Set<Window<K, V>>()
  private collecting: Window<K, V> | undefined

  private hits = 0
  private misses = 0
  private dispatches = 0
  private failures = 0
  private primed = 0

  constructor(options: BatchCacheOptions<K, V, R>) {
    this.name = options.name ?? "loader"

    if (typeof options.fetch !== "function") {
      throw LoaderError.invalidOption(this.name, "fetch", options.fetch)
    }
    if (typeof options.reconcile !== "function") {
      throw LoaderError.invalidOption(this.name, "reconcile", options.reconcile)
    }
    if (
      options.maxBatchSize !== undefined &&
      !(Number.isInteger(options.maxBatchSize) && options.maxBatchSize > 0)
    ) {
      throw LoaderError.invalidOption(this.name, "maxBatchSize", options.maxBatchSize)
    }

    this.fetchFn = options.fetch
    this.reconcileFn = options.reconcile
    this.logger = options.logger ?? new NullLogger()
    this.scheduler = options.scheduler ?? new MicrotaskScheduler()
    this.maxBatchSize = options.maxBatchSize
    this.cacheKeyFn = options.cacheKeyFn ?? defaultCacheKey
  }

  load(key: K): Promise<V> {
    const id = this.cacheKeyFn(key)
    const entry = this.resolved.get(id)

    if (entry) {
      this.hits++
      return Promise.resolve(entry.value)
    }

    this.misses++

    const inflight = this.pending.get(id)
    if (inflight) return inflight

    const window = this.openWindow()
    const deferred = createDeferred<V>()

    window.entries.push({ key, id, deferred })
    this.pending.set(id, deferred.promise)

    if (this.maxBatchSize !== undefined && window.entries.length >= this.maxBatchSize) {
      this.collecting = undefined
    }

    return deferred.promise
  }

  loadMany(keys: readonly K[]): Promise<V[]> {
    return Promise.all(keys.map((key) => this.load(key)))
  }

  prime(key: K, value: V): boolean {
    if (value === null || value === undefined) return false

    const installed = this.install(key, value)
    if (installed) {
      this.logger.trace("primed entries", { loader: this.name, primed: 1 })
    }

    return installed
  }

  primeMany(values: readonly V[], keyOf: (value: NonNullable<V>) => K): number {
    const entries: [K, V][] = []

    for (const value of values) {
      if (value === null || value === undefined) continue
      entries.push([keyOf(value), value])
    }

    return this.primeEntries(entries)
  }

  primeEntries(entries: Iterable<readonly [K, V]>): number {
    let count = 0

    for (const [key, value] of entries) {
      if (value === null || value === undefined) continue
      if (this.install(key, value)) count++
    }

    if (count > 0) {
      this.logger.trace("primed entries", { loader: this.name, primed: count })
    }

    return count
  }

  get state(): BatchCacheState {
    let dispatching = false

    for (const window of this.windows) {
      if (window.phase === "collecting") return "collecting"
      dispatching = true
    }

    return dispatching ? "dispatching" : "idle"
  }

  get size(): number {
    return this.resolved.size
  }

  stats(): BatchCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      dispatches: this.dispatches,
      failures: this.failures,
      primed: this.primed,
    }
  }

  private install(key: K, value: V): boolean {
    const id = this.cacheKeyFn(key)
    if (this.resolved.has(id) || this.pending.has(id)) return false

    this.resolved.set(id, { value })
    this.primed++

    return true
  }

  private openWindow(): Window<K, V> {
    if (this.collecting) return this.collecting

    const window: Window<K, V> = { entries: [], phase: "collecting" }

    this.collecting = window
    this.windows.add(window)
    this.scheduler.schedule(() => this.dispatch(window))

    return window
  }

  private async dispatch(window: Window<K, V>): Promise<void> {
    if (this.collecting === window) this.collecting = undefined

    window.phase = "dispatching"
    this.dispatches++

    const keys = window.entries.map((entry) => entry.key)
    const startedAt = now()

    this.logger.debug("dispatching window", { loader: this.name, batchSize: keys.length })

    try {
      const records = await this.fetchFn(keys)
      const values = this.reconcileFn(keys, records)

      if (values.length !== keys.length) {
        throw LoaderError.batchLengthMismatch(this.name, keys.length, values.length)
      }

      values.forEach((value, index) => {
        const entry = window.entries[index]
        if (!entry) return

        this.resolved.set(entry.id, { value })
        this.pending.delete(entry.id)
        entry.deferred.resolve(value)
      })

      this.logger.debug("window settled", {
        loader: this.name,
        batchSize: keys.length,
        durationMs: now() - startedAt,
      })
    } catch (err) {
      this.failures++
      this.logger.warn("window failed", { loader: this.name, batchSize: keys.length, err })

      for (const entry of window.entries) {
        this.pending.delete(entry.id)
        entry.deferred.reject(err)
      }
    } finally {
      this.windows.delete(window)
    }
  }
}
