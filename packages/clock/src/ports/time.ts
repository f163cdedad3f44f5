/** Milliseconds since the Unix epoch, or a millisecond duration. */
export type Milliseconds = number

/** A duration in whole seconds, as Redis EXPIRE takes it. */
export type Seconds = number
