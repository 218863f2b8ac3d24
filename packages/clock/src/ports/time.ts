/** A duration in milliseconds. */
export type Milliseconds = number

/** A duration in seconds. Fractions are allowed. */
export type Seconds = number

/** An absolute instant, in milliseconds since the Unix epoch. */
export type UnixMs = number
