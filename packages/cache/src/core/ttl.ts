import type { Milliseconds, UnixMs } from "@tiercache/clock"
import type { CacheTtl } from "../ports/cache-ttl"

/**
 * Converts a TTL to the millisecond duration backends take. A zero duration
 * stays `0` (no expiry); a deadline already in the past becomes 1ms.
 */
export function ttlToMs(ttl: CacheTtl | undefined, nowMs: UnixMs): Milliseconds | undefined {
  if (ttl === undefined) return undefined

  switch (ttl.kind) {
    case "seconds":
      return Math.round(ttl.seconds * 1000)
    case "milliseconds":
      return ttl.milliseconds
    case "until":
      return Math.max(1, ttl.expiresAt.getTime() - nowMs)
  }
}

export function secondsTtl(seconds: number): CacheTtl {
  return { kind: "seconds", seconds }
}

export function millisecondsTtl(milliseconds: Milliseconds): CacheTtl {
  return { kind: "milliseconds", milliseconds }
}
