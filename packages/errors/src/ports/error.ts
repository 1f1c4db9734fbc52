/**
 * Error codes are lower snake case, e.g. `file_not_found`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured data carried by an error (paths, keys, ids) so messages stay
 * free of interpolated values.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing file, unknown registry id),
   * `false` for programmer errors and invariant violations.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
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
