import { BaseError } from "@prefixlog/errors"

export class UnknownSeverityError extends BaseError<"unknown_severity"> {
  readonly input: unknown

  constructor(input: unknown) {
    const shown = typeof input === "string" ? JSON.stringify(input) : String(input)

    super(`unknown severity: ${shown}`, {
      code: "unknown_severity",
      context: { input },
    })
    this.input = input
  }
}
