import type { Milliseconds, Seconds } from "@tiercache/clock"
import type { WireValue } from "./wire-value"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

/**
 * Time to live for a cache entry. A duration of zero means the entry never
 * expires.
 */
export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl

export type CacheCallOptions = {
  /** Replaces the instance namespace for this call. */
  namespace?: string

  /** Replaces the instance timeout for this call. `0` disables it. */
  timeoutMs?: Milliseconds
}

export type CacheWriteOptions = CacheCallOptions & {
  /** Defaults to the instance TTL; without either the entry does not expire. */
  ttl?: CacheTtl
}

export type CacheSetOptions = CacheWriteOptions & {
  /**
   * Only write if the stored value still equals this token, as returned by
   * `gets()`. A mismatch makes `set()` resolve to `false`.
   */
  casToken?: WireValue
}

export type CacheClearOptions = {
  /** Defaults to the instance namespace; an empty namespace clears everything. */
  namespace?: string
  timeoutMs?: Milliseconds
}
