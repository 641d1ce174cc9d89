import { type LogLevelName, logLevelNames } from "@prism/logger"
import { z } from "zod/mini"

export const schedulerNames = ["microtask", "interval"] as const

export type SchedulerName = (typeof schedulerNames)[number]

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Page Directory"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  LOADER_SCHEDULER: z._default(z.enum(schedulerNames), "microtask"),
  LOADER_BATCH_INTERVAL_MS: z._default(z.coerce.number().check(z.nonnegative()), 5),
  LOADER_MAX_BATCH_SIZE: z.optional(z.coerce.number().check(z.positive(), z.multipleOf(1))),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  loader: {
    scheduler: SchedulerName
    batchIntervalMs: number
    maxBatchSize?: number
  }
}
