/**
 * Validated configuration with provenance.
 *
 * @typeParam T - The shape of the configuration object, usually inferred from a zod schema.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({
 *     LOADER_MAX_BATCH_SIZE: z.coerce.number().optional(),
 *     LOG_LEVEL: z.enum(logLevelNames).default("info"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("LOG_LEVEL")      // "info"
 * config.explain("LOG_LEVEL")  // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`
   * ("env", "dotenv:.env", ..., or "default" for schema defaults).
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of every source that contributed a value, deduplicated. */
  sourcesUsed(): string[]

  /**
   * Keys supplied by some source but not part of the schema. Handy for
   * spotting typos such as `LOADER_MAX_BATCHSIZE`.
   */
  extras(): string[]
}
