import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** A `zod` or `zod/mini` schema. */
  schema: z.core.$ZodType<T>
  /** Applied in order, later sources win. Defaults to `[new EnvSource()]`. */
  sources?: ConfigSource[] | undefined
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    throw ConfigError.invalid(
      z.prettifyError(result.error),
      resolvedSources.map((s) => s.name),
    )
  }

  const known = new Set(Object.keys(result.data))
  const keptProvenance: Record<string, string> = {}

  for (const [key, name] of Object.entries(provenance)) {
    if (known.has(key)) keptProvenance[key] = name
  }

  return new Config<T>(result.data, keptProvenance, new Set(Object.keys(merged)))
}
