import seed from "../data/seed-pages.json"
import type { Page, PageFilter } from "../model/page.model"

export type PageStoreDeps = {
  pages?: readonly Page[]
}

/**
 * In-memory page table. Counts every `findPages` call so callers can see how
 * many round trips a request made.
 */
export class PageStore {
  private readonly pages: readonly Page[]
  private queries = 0

  public constructor(deps: PageStoreDeps = {}) {
    this.pages = [...(deps.pages ?? seed)]
  }

  get queryCount(): number {
    return this.queries
  }

  async findPages(filter: PageFilter): Promise<Page[]> {
    this.queries++

    return this.pages.filter(
      (page) =>
        (filter.ids?.includes(page.id) ?? false) ||
        (filter.slugs?.includes(page.slug) ?? false) ||
        (filter.ownerIds?.includes(page.ownerId) ?? false),
    )
  }
}
