/** Stable, lowercase, snake_case identifier such as `key_exists`. */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (keys, namespaces, sizes).
 * Carry data here instead of formatting it into the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed (timeouts, transient outages). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a key already exists, a backend timed out),
   * `false` for programmer errors and misconfiguration.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
