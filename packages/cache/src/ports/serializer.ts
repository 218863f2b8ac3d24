import type { WireEncoding, WireValue } from "./wire-value"

/**
 * Converts between cached values and what a backend stores.
 *
 * `encoding` tells backends how to return stored values to `decode()`: a text
 * encoding for serializers that work on strings, `null` for ones that take
 * bytes as they are.
 */
export interface Serializer<T> {
  readonly encoding: WireEncoding

  encode(value: T): WireValue
  decode(wire: WireValue): T
}
