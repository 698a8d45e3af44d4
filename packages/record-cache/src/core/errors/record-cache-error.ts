import { BaseError, type ErrorContext } from "@recache/errors"
import type { CacheKey } from "../../ports/cache-key"

export type RecordCacheErrorCode =
  | "configuration_error"
  | "unknown_index"
  | "invalid_argument"
  | "decode_error"

export class RecordCacheError extends BaseError<RecordCacheErrorCode> {
  static configuration(input: {
    path: string
    message: string
    issues?: readonly { path: string; message: string }[]
  }): RecordCacheError {
    return new RecordCacheError(`Invalid cache configuration at ${input.path}: ${input.message}`, {
      code: "configuration_error",
      context: {
        path: input.path,
        ...(input.issues !== undefined && { issues: input.issues }),
      },
    })
  }

  static unknownIndex(input: { index: string; known: readonly string[] }): RecordCacheError {
    return new RecordCacheError(`Unknown index "${input.index}"`, {
      code: "unknown_index",
      context: { index: input.index, known: input.known },
    })
  }

  static invalidArgument(message: string, context?: ErrorContext): RecordCacheError {
    return new RecordCacheError(message, {
      code: "invalid_argument",
      ...(context !== undefined && { context }),
    })
  }

  static decodeFailed(input: { key: CacheKey; cause: unknown }): RecordCacheError {
    return new RecordCacheError(`Failed to decode cached value at "${input.key}"`, {
      code: "decode_error",
      context: { key: input.key },
      cause: input.cause,
    })
  }
}
