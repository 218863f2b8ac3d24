import type { WireValue } from "./wire-value"

export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss

/**
 * A hit that also carries the stored representation it was decoded from.
 * Passing `token` back as `casToken` makes a write conditional on nobody
 * having changed the entry since.
 */
export type VersionedHit<T> = CacheHit<T> & {
  token: WireValue
}

export type VersionedResult<T> = VersionedHit<T> | CacheMiss
