import type { Milliseconds } from "@tiercache/clock"
import { BaseError } from "@tiercache/errors"

export class KeyExistsError extends BaseError<"key_exists"> {
  constructor(key: string) {
    super(`Key "${key}" already exists`, {
      code: "key_exists",
      context: { key },
    })
  }
}

export class NotAnIntegerError extends BaseError<"not_an_integer"> {
  constructor(key: string, options?: { cause?: unknown }) {
    super(`Value at "${key}" is not an integer`, {
      code: "not_an_integer",
      context: { key },
      cause: options?.cause,
    })
  }
}

export class OversizedValueError extends BaseError<"oversized_value"> {
  constructor(key: string, size: number, maxBytes: number) {
    super(`Value for "${key}" is ${size} bytes, over the ${maxBytes} byte budget`, {
      code: "oversized_value",
      context: { key, size, maxBytes },
    })
  }
}

export class OptimisticLockConflictError extends BaseError<"optimistic_lock_conflict"> {
  constructor(key: string) {
    super(`Value at "${key}" changed since it was read`, {
      code: "optimistic_lock_conflict",
      context: { key },
    })
  }
}

export class CacheTimeoutError extends BaseError<"cache_timeout"> {
  constructor(op: string, timeoutMs: Milliseconds, key?: string) {
    super(`Cache ${op} timed out after ${timeoutMs}ms`, {
      code: "cache_timeout",
      context: key === undefined ? { op, timeoutMs } : { op, timeoutMs, key },
      isRetryable: true,
    })
  }
}

export class AllLayersFailedError extends BaseError<"all_layers_failed"> {
  constructor(op: string, errors: readonly unknown[], key?: string) {
    super(`Cache ${op} failed on all ${errors.length} layers`, {
      code: "all_layers_failed",
      context: key === undefined ? { op, layers: errors.length } : { op, layers: errors.length, key },
      cause: new AggregateError(errors, `Cache ${op} failed on every layer`),
    })
  }
}

export class SerializationError extends BaseError<"serialization_failed"> {
  constructor(direction: "encode" | "decode", serializer: string, options?: { cause?: unknown }) {
    super(`${serializer} could not ${direction} the value`, {
      code: "serialization_failed",
      context: { direction, serializer },
      cause: options?.cause,
    })
  }
}

export class UnsupportedCommandError extends BaseError<"unsupported_command"> {
  constructor(backend: string, command: string) {
    super(`${backend} backend does not support raw command "${command}"`, {
      code: "unsupported_command",
      context: { backend, command },
    })
  }
}

export class CacheConfigError extends BaseError<"cache_config_invalid"> {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, {
      code: "cache_config_invalid",
      context: options?.context,
      cause: options?.cause,
      isOperational: false,
    })
  }
}
