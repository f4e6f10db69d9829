/** Whole microseconds since the Unix epoch. */
export type Microseconds = number
