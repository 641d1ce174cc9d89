import {
  type BatchCacheStats,
  type BatchScheduler,
  createQuery,
  type ExactView,
  type GroupView,
  type ViewRegistry,
} from "@prism/loader"
import type { Logger } from "@prism/logger"
import { PageError } from "../model/page.errors"
import type { Page, PageFilter, PageId } from "../model/page.model"
import type { PageStore } from "./page-store"

export type PageServiceDeps = {
  store: PageStore
  logger: Logger
  scheduler: BatchScheduler
  maxBatchSize?: number | undefined
}

/**
 * Request-scoped page lookups. Every view reads through one registry over
 * `store.findPages`, so a page fetched by id is already cached by slug.
 */
export class PageService {
  readonly registry: ViewRegistry<[PageFilter], Page>
  readonly byId: ExactView<PageId, Page>
  readonly bySlug: ExactView<string, Page>
  readonly forOwner: GroupView<number, Page>

  public constructor(deps: PageServiceDeps) {
    const { store, logger, scheduler, maxBatchSize } = deps

    this.registry = createQuery((filter: PageFilter) => store.findPages(filter), {
      name: "pages",
      logger,
      scheduler,
    })

    this.byId = this.registry.exact({
      name: "pages.byId",
      key: (page) => page.id,
      load: (ids, query) => query({ ids }),
      maxBatchSize,
    })
    this.bySlug = this.registry.exact({
      name: "pages.bySlug",
      key: (page) => page.slug,
      load: (slugs, query) => query({ slugs }),
      maxBatchSize,
    })
    this.forOwner = this.registry.group({
      name: "pages.forOwner",
      key: (page) => page.ownerId,
      sort: (page) => page.id,
      load: (ownerIds, query) => query({ ownerIds }),
      maxBatchSize,
    })
  }

  getPage(id: PageId): Promise<Page | null> {
    return this.byId.load(id)
  }

  getPages(ids: readonly PageId[]): Promise<(Page | null)[]> {
    return this.byId.loadMany(ids)
  }

  getPageBySlug(slug: string): Promise<Page | null> {
    return this.bySlug.load(slug)
  }

  pagesForOwner(ownerId: number): Promise<Page[]> {
    return this.forOwner.load(ownerId)
  }

  async requirePage(id: PageId): Promise<Page> {
    const page = await this.byId.load(id)
    if (!page) throw PageError.notFound({ id })

    return page
  }

  /** Warms every exact view from one query, e.g. a listing already in hand. */
  async preload(filter: PageFilter): Promise<Page[]> {
    return this.registry.execute(filter)
  }

  stats(): Record<string, BatchCacheStats> {
    return {
      byId: this.byId.stats(),
      bySlug: this.bySlug.stats(),
      forOwner: this.forOwner.stats(),
    }
  }
}
