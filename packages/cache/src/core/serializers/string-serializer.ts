import type { Serializer } from "../../ports/serializer"
import type { WireValue } from "../../ports/wire-value"
import { toBytes } from "../wire"

/** Stores strings as they are. */
export class StringSerializer implements Serializer<string> {
  readonly encoding = "utf8"

  encode(value: string): WireValue {
    return value
  }

  decode(wire: WireValue): string {
    return typeof wire === "string" ? wire : toBytes(wire).toString("utf8")
  }
}
