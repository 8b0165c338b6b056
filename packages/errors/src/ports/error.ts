export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error, e.g. the parameter or provider
 * involved. Keeps message strings free of interpolated data.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if running the same operation again might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a malformed env entry, an unreadable
   * file), `false` for contract violations that only a code change can fix
   * (conflicting declarations, a missing required parameter at startup).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for log lines.
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
