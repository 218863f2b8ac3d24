import type { WireEncoding, WireValue } from "../ports/wire-value"

export function toBytes(value: WireValue): Buffer {
  if (typeof value === "string") return Buffer.from(value, "utf8")

  return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
}

/** Applies a backend read encoding to a stored value. */
export function decodeWire(value: WireValue, encoding: WireEncoding): WireValue {
  if (encoding === null || typeof value === "string") return value

  return toBytes(value).toString(encoding)
}

/** Strings compare as text; otherwise byte by byte, strings as UTF-8. */
export function wireEquals(a: WireValue, b: WireValue): boolean {
  if (typeof a === "string" && typeof b === "string") return a === b

  return toBytes(a).equals(toBytes(b))
}

export function byteLength(value: WireValue): number {
  return typeof value === "string" ? Buffer.byteLength(value, "utf8") : value.byteLength
}
