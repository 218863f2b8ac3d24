import type { AddResult } from "../ports/add-result"
import { KeyExistsError } from "./errors"

/** Maps an add outcome to `add()`'s contract: throw on collision, `false` if rejected. */
export function settleAdd(key: string, result: AddResult): boolean {
  if (result.kind === "written") return true
  if (result.reason === "exists") throw new KeyExistsError(key)

  return false
}
