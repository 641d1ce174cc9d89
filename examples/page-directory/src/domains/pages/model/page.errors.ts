import { BaseError } from "@prism/errors"
import type { PageId } from "./page.model"

export type PageErrorCode = "page_not_found"

export class PageError extends BaseError<PageErrorCode> {
  static notFound(input: { id?: PageId; slug?: string }): PageError {
    const label = input.slug !== undefined ? `slug "${input.slug}"` : `id ${input.id}`

    return new PageError(`No page with ${label}`, {
      code: "page_not_found",
      context: {
        ...(input.id !== undefined && { id: input.id }),
        ...(input.slug !== undefined && { slug: input.slug }),
      },
      isRetryable: false,
    })
  }
}
