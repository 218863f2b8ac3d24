import type { Serializer } from "../../ports/serializer"
import type { WireValue } from "../../ports/wire-value"

/** Hands values to the backend untouched and returns them as stored. */
export class PassthroughSerializer implements Serializer<WireValue> {
  readonly encoding = null

  encode(value: WireValue): WireValue {
    return value
  }

  decode(wire: WireValue): WireValue {
    return wire
  }
}
