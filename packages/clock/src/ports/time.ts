/** A duration or instant expressed in milliseconds. */
export type Milliseconds = number

/** A duration expressed in whole seconds, the unit Redis expiry works in. */
export type Seconds = number

export function secondsToMs(seconds: Seconds): Milliseconds {
  return seconds * 1000
}
