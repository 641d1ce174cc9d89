export type PageId = number

export type Page = {
  id: PageId
  slug: string
  title: string
  ownerId: number
}

/** Pages matching any of the given lists. */
export type PageFilter = {
  ids?: readonly PageId[]
  slugs?: readonly string[]
  ownerIds?: readonly number[]
}
