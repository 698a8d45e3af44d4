/** Machine-readable error code, snake_case by convention (`unknown_index`). */
export type ErrorCode = Lowercase<string>

/** Structured data attached to an error: keys, index names, config paths. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** Whether the same call may succeed if repeated. */
  readonly isRetryable: boolean

  /**
   * `true` for failures the caller is expected to handle (bad input, unknown
   * index, invalid configuration). `false` for broken invariants, such as a
   * backend reply that does not fit the protocol.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe rendering of any thrown value, for logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
