import type { WireValue } from "../ports/wire-value"
import { NotAnIntegerError } from "./errors"
import { toBytes } from "./wire"

const INTEGER = /^[+-]?\d+$/

/** Parses an integer stored as text or as the UTF-8 bytes of one. */
export function parseStoredInteger(key: string, value: WireValue): number {
  const text = (typeof value === "string" ? value : toBytes(value).toString("utf8")).trim()

  if (!INTEGER.test(text)) throw new NotAnIntegerError(key)

  const parsed = Number(text)

  if (!Number.isSafeInteger(parsed)) throw new NotAnIntegerError(key)

  return parsed
}

export function assertDelta(delta: number): void {
  if (!Number.isSafeInteger(delta)) {
    throw new RangeError(`increment delta must be a safe integer, got ${delta}`)
  }
}
