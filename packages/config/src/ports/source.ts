/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in `loadConfig`,
 * where later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance name, e.g. "env" or "dotenv:.env". */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` means "not
   * provided" and never overrides an earlier source.
   */
  load(): Promise<Record<string, unknown>>
}
