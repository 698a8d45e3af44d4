export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock } from "./ports/clock"
export { secondsToMs } from "./ports/time"
export type { Milliseconds, Seconds } from "./ports/time"
