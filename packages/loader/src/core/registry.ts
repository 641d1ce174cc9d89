import { type Logger, NullLogger } from "@prism/logger"
import type { BatchScheduler } from "../ports/batch-scheduler"
import type { Key } from "../ports/key"
import type { ExactViewSpec, GroupViewSpec, RegistryOptions } from "../ports/options"
import type { BoundQuery, RegisteredView } from "../ports/view"
import { LoaderError } from "./errors/loader-error"
import { ExactView } from "./views/exact-view"
import { GroupView } from "./views/group-view"

export type QueryFn<A extends unknown[], R> = (...args: A) => Promise<readonly R[]>

/**
 * Binds one source query to a set of keyed views and keeps their caches
 * coherent: every execution primes the exact views that did not trigger it.
 *
 * Views are registered up front, before the first execution. Keys for every
 * view are extracted before any is primed, so a throwing extractor leaves
 * all of them untouched.
 *
 * @example
 * ```ts
 * const pages = createQuery((filter: PageFilter) => store.findPages(filter))
 *
 * const byId = pages.exact({
 *   name: "byId",
 *   key: (page) => page.id,
 *   load: (ids, query) => query({ ids }),
 * })
 * const bySlug = pages.exact({
 *   name: "bySlug",
 *   key: (page) => page.slug,
 *   load: (slugs, query) => query({ slugs }),
 * })
 *
 * await byId.loadMany([1, 2]) // one query, also primes bySlug
 * ```
 */
export class ViewRegistry<A extends unknown[], R> {
  readonly name: string

  private readonly query: QueryFn<A, R>
  private readonly logger: Logger
  private readonly scheduler: BatchScheduler | undefined
  private readonly registered: RegisteredView<R>[] = []
  private sealed = false
  private executionCount = 0

  constructor(query: QueryFn<A, R>, options: RegistryOptions = {}) {
    if (typeof query !== "function") {
      throw LoaderError.invalidOption(options.name ?? "query", "query", query)
    }

    this.name = options.name ?? "query"
    this.query = query
    this.logger = options.logger ?? new NullLogger()
    this.scheduler = options.scheduler
  }

  get views(): readonly RegisteredView<R>[] {
    return [...this.registered]
  }

  get executions(): number {
    return this.executionCount
  }

  exact<K extends Key>(spec: ExactViewSpec<A, R, K>): ExactView<K, R> {
    const name = this.claimName(spec.name, "exact")
    const view: ExactView<K, R> = new ExactView<K, R>({
      name,
      key: spec.key,
      fetch: (keys) => spec.load(keys, this.bind(view)),
      logger: this.logger,
      scheduler: spec.scheduler ?? this.scheduler,
      maxBatchSize: spec.maxBatchSize,
      cacheKeyFn: spec.cacheKeyFn,
    })

    this.registered.push(view)

    return view
  }

  group<K extends Key>(spec: GroupViewSpec<A, R, K>): GroupView<K, R> {
    const name = this.claimName(spec.name, "group")
    const view: GroupView<K, R> = new GroupView<K, R>({
      name,
      key: spec.key,
      sort: spec.sort,
      fetch: (keys) => spec.load(keys, this.bind(view)),
      logger: this.logger,
      scheduler: spec.scheduler ?? this.scheduler,
      maxBatchSize: spec.maxBatchSize,
      cacheKeyFn: spec.cacheKeyFn,
    })

    this.registered.push(view)

    return view
  }

  /** Runs the query once and primes every view with its records. */
  execute(...args: A): Promise<R[]> {
    return this.run(undefined, args)
  }

  private bind(invoker: RegisteredView<R>): BoundQuery<A, R> {
    return (...args: A) => this.run(invoker, args)
  }

  private async run(invoker: RegisteredView<R> | undefined, args: A): Promise<R[]> {
    this.sealed = true
    this.executionCount++

    const records = [...(await this.query(...args))]
    const commits = this.registered
      .filter((view) => view !== invoker)
      .map((view) => view.stagePrime(records))

    for (const commit of commits) commit()
    const primedViews = commits.length

    this.logger.debug("query executed", {
      registry: this.name,
      records: records.length,
      primedViews,
      ...(invoker && { loader: invoker.name }),
    })

    return records
  }

  private claimName(requested: string | undefined, mode: string): string {
    const name = requested ?? `${mode}-${this.registered.length + 1}`

    if (this.sealed) throw LoaderError.registrySealed(this.name, name)
    if (this.registered.some((view) => view.name === name)) {
      throw LoaderError.duplicateView(this.name, name)
    }

    return name
  }
}

export function createQuery<A extends unknown[], R>(
  query: QueryFn<A, R>,
  options: RegistryOptions = {},
): ViewRegistry<A, R> {
  return new ViewRegistry(query, options)
}
