import type { Clock } from "../ports/clock"
import { type Milliseconds, type Seconds, secondsToMs } from "../ports/time"

/** A clock that only moves when a test moves it. */
export class FakeClock implements Clock {
  private current: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.current = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.current)
  }

  nowMs(): Milliseconds {
    return this.current
  }

  advance(ms: Milliseconds): void {
    this.current += ms
  }

  /** Matches the unit of key expiry in the backing store. */
  advanceSeconds(seconds: Seconds): void {
    this.advance(secondsToMs(seconds))
  }

  set(at: Milliseconds | Date): void {
    this.current = typeof at === "number" ? at : at.getTime()
  }
}
