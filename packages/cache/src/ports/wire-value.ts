/**
 * What a backend actually stores: text, or raw bytes.
 */
export type WireValue = string | Uint8Array

/**
 * How a backend should hand stored values back.
 *
 * A text encoding decodes stored bytes to a string; `null` returns the
 * stored value untouched.
 */
export type WireEncoding = BufferEncoding | null
