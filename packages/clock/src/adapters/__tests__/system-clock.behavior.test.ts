import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("nowMs() reads the wall clock", () => {
    const clock = new SystemClock()

    expect(clock.nowMs()).toBe(Date.parse("2024-01-15T10:30:00.000Z"))
  })

  it("now() and nowMs() agree", () => {
    const clock = new SystemClock()

    expect(clock.now().getTime()).toBe(clock.nowMs())
  })
})
