import type { Logger } from "@prism/logger"
import { PageStore } from "../domains/pages/services/page-store"
import { type AppConfig, loadAppConfig } from "./config"
import { type CoreServices, createCoreServices } from "./services/core"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  logger?: Logger
  store?: PageStore
}

export type AppContext = {
  config: AppConfig
  core: CoreServices
  store: PageStore
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)
  const baseCore = createCoreServices(config)

  const core: CoreServices = {
    ...baseCore,
    ...(options.logger !== undefined && { logger: options.logger }),
  }

  return {
    config,
    core,
    store: options.store ?? new PageStore(),
  }
}
