import { FakeClock } from "@recache/clock"
import { bytes } from "../../../tests/utils/record-cache-test-helpers"
import { MemoryBackingStore } from "../memory-backing-store"

describe("MemoryBackingStore (behavior)", () => {
  let clock: FakeClock
  let store: MemoryBackingStore

  beforeEach(() => {
    clock = new FakeClock(1_000)
    store = new MemoryBackingStore({ clock })
  })

  describe("expiry", () => {
    it("keeps a key until its ttl has fully elapsed", async () => {
      await store.set("k1", bytes.of("v1"), { ttlSeconds: 10 })

      clock.advance(9_999)
      expect(bytes.text(await store.get("k1"))).toBe("v1")

      clock.advance(1)
      await expect(store.get("k1")).resolves.toBeNull()
    })

    it("never expires a key written without ttl or with ttl 0", async () => {
      await store.set("k1", bytes.of("v1"))
      await store.set("k2", bytes.of("v2"), { ttlSeconds: 0 })

      clock.advanceSeconds(365 * 24 * 3600)

      expect((await store.mGet(["k1", "k2"])).map((v) => bytes.text(v))).toStrictEqual([
        "v1",
        "v2",
      ])
    })

    it("applies ttl to pipelined writes", async () => {
      await store.pipeline().set("k1", bytes.of("v1"), { ttlSeconds: 5 }).exec()

      clock.advanceSeconds(5)

      await expect(store.get("k1")).resolves.toBeNull()
    })

    it("drops expired keys from size", async () => {
      await store.set("k1", bytes.of("v1"), { ttlSeconds: 1 })
      await store.set("k2", bytes.of("v2"))

      expect(store.size).toBe(2)

      clock.advanceSeconds(1)

      expect(store.size).toBe(1)
    })
  })

  describe("isolation", () => {
    it("stores a copy of the written bytes", async () => {
      const value = bytes.of("abc")
      await store.set("k1", value)

      value[0] = 0x7a

      expect(bytes.text(await store.get("k1"))).toBe("abc")
    })

    it("returns a copy the caller may mutate", async () => {
      await store.set("k1", bytes.of("abc"))

      const first = await store.get("k1")
      first?.fill(0x7a)

      expect(bytes.text(await store.get("k1"))).toBe("abc")
    })
  })
})
