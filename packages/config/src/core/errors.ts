import { BaseError } from "@prefixlog/errors"

/** The merged sources did not satisfy the schema. */
export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(details: { pretty: string; paths: string[]; sources: string[] }) {
    super(`Configuration validation failed:\n${details.pretty}`, {
      code: "config_invalid",
      context: { paths: details.paths, sources: details.sources },
    })
  }
}
