import { BaseError } from "@strata/errors"

export type ConfigIssue = {
  path: string
  message: string
}

export class ConfigError extends BaseError<"config_invalid"> {
  static invalid(summary: string, issues: ConfigIssue[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: { issues },
    })
  }
}
