import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@prism/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    loader: {
      scheduler: env.LOADER_SCHEDULER,
      batchIntervalMs: env.LOADER_BATCH_INTERVAL_MS,
      ...(env.LOADER_MAX_BATCH_SIZE !== undefined && {
        maxBatchSize: env.LOADER_MAX_BATCH_SIZE,
      }),
    },
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    ...(env.NODE_ENV
      ? [new DotenvSource({ file: `.env.${env.NODE_ENV}`, required: false, cwd })]
      : []),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
