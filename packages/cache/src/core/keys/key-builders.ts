import type { KeyBuilder } from "../../ports/key-builder"

/** `namespace + key`. An empty namespace leaves the key as is. */
export const defaultKeyBuilder: KeyBuilder = (key, namespace) => `${namespace}${key}`

/** `namespace:key`, or just `key` without a namespace. */
export const colonKeyBuilder: KeyBuilder = (key, namespace) =>
  namespace === "" ? key : `${namespace}:${key}`
