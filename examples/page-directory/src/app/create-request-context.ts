import { randomUUID } from "node:crypto"
import { type AppError, toAppError } from "@prism/errors"
import type { Logger } from "@prism/logger"
import { PageService } from "../domains/pages/services/page-service"
import type { AppContext } from "./create-context"

export type RequestContext = {
  requestId: string
  logger: Logger
  pages: PageService
  /** Logs a failure by its error code (warn when operational, error otherwise). */
  fail: (err: unknown) => AppError
}

/**
 * Builds the per-request scope. Loaders live exactly as long as the request,
 * so nothing cached here leaks into another request.
 */
export function createRequestContext(
  app: AppContext,
  requestId: string = randomUUID(),
): RequestContext {
  const logger = app.core.logger.child({ requestId })

  const pages = new PageService({
    store: app.store,
    logger,
    scheduler: app.core.createScheduler(),
    maxBatchSize: app.config.loader.maxBatchSize,
  })

  const fail = (err: unknown): AppError => {
    const appError = toAppError(err)
    const meta = { err: appError, code: appError.code }

    if (appError.isOperational) logger.warn("request failed", meta)
    else logger.error("request failed", meta)

    return appError
  }

  return { requestId, logger, pages, fail }
}
