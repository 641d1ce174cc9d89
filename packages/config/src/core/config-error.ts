import { BaseError } from "@prism/errors"

export type ConfigErrorCode = "config_invalid"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(report: string, sources: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${report}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: false,
    })
  }
}
