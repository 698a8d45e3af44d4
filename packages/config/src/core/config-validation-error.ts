import { BaseError } from "@recache/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(
    message: string,
    readonly issues: readonly { path: string; message: string }[],
  ) {
    super(message, {
      code: "config_invalid",
      context: { issues },
      isRetryable: false,
    })
  }
}
