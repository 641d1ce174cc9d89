import {
  type BatchScheduler,
  createIntervalScheduler,
  createMicrotaskScheduler,
} from "@prism/loader"
import { createPinoLogger, type Logger } from "@prism/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  /** Each request scope gets its own scheduler instance. */
  createScheduler: () => BatchScheduler
}

export function createSchedulerFactory(loader: AppConfig["loader"]): () => BatchScheduler {
  if (loader.scheduler === "interval") {
    return () => createIntervalScheduler({ delayMs: loader.batchIntervalMs })
  }

  return createMicrotaskScheduler
}

export function createCoreServices(config: AppConfig): CoreServices {
  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    {
      service: config.app.serviceName,
      env: config.app.env,
    },
  )

  return { logger, createScheduler: createSchedulerFactory(config.loader) }
}
