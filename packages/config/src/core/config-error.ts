import { BaseError } from "@keystash/errors"

export type ConfigErrorCode = "config_invalid" | "config_source_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      isOperational: false,
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source "${source}" could not be loaded`, {
      code: "config_source_failed",
      context: { source },
      cause,
    })
  }
}
