import type { Milliseconds } from "./time"

/**
 * Source of the current time.
 *
 * @remarks
 * Components that compute expiry deadlines take a Clock instead of calling
 * `Date.now()` so tests can move time explicitly.
 */
export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}
