import type { Serializer } from "../../ports/serializer"
import type { WireValue } from "../../ports/wire-value"
import { SerializationError } from "../errors"
import { toBytes } from "../wire"

/**
 * JSON text. Like any plain JSON codec it does not round-trip `Date`, `Map`,
 * `Set`, `BigInt` or class instances.
 */
export class JsonSerializer<T = unknown> implements Serializer<T> {
  readonly encoding = "utf8"

  encode(value: T): WireValue {
    let text: string | undefined

    try {
      text = JSON.stringify(value)
    } catch (err) {
      throw new SerializationError("encode", "JsonSerializer", { cause: err })
    }

    // JSON.stringify(undefined) and friends produce no text at all
    if (text === undefined) throw new SerializationError("encode", "JsonSerializer")

    return text
  }

  decode(wire: WireValue): T {
    const text = typeof wire === "string" ? wire : toBytes(wire).toString("utf8")

    try {
      return JSON.parse(text)
    } catch (err) {
      throw new SerializationError("decode", "JsonSerializer", { cause: err })
    }
  }
}
