export type Milliseconds = number
export type Seconds = number

/** Whole seconds since the Unix epoch. */
export type UnixSeconds = number
