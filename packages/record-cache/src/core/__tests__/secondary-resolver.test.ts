import { FakeClock } from "@recache/clock"
import { mock } from "vitest-mock-extended"
import { MemoryBackingStore } from "../../adapters/memory/memory-backing-store"
import type { BackingPipeline, BackingStore } from "../../ports/backing-store"
import { bytes } from "../../tests/utils/record-cache-test-helpers"
import { NEGATIVE_MARKER } from "../negative-marker"
import { RESOLVE_SECONDARY_SCRIPT, SecondaryResolver } from "../secondary-resolver"

describe("SecondaryResolver", () => {
  describe("script", () => {
    it("checks the index entry for nil before following it", () => {
      expect(RESOLVE_SECONDARY_SCRIPT.lua).toContain("if not primary then")
      expect(RESOLVE_SECONDARY_SCRIPT.lua).toContain("redis.call('GET', ARGV[1] .. primary)")
    })

    it("reads only the keys the in-process rendering is given", () => {
      const reads: string[] = []
      const view = {
        get: (key: string) => {
          reads.push(key)
          return key === "idx" ? bytes.of("u1") : null
        },
      }

      const value = RESOLVE_SECONDARY_SCRIPT.run(view, ["idx"], ["app:", NEGATIVE_MARKER])

      expect(value).toBeNull()
      expect(reads).toStrictEqual(["idx", "app:u1"])
    })
  })

  describe("resolve", () => {
    it("passes the index key, keyspace prefix and marker to the store", async () => {
      const store = mock<BackingStore>()
      store.runScript.mockResolvedValue(bytes.of("record"))
      const resolver = new SecondaryResolver(store, "app:")

      const value = await resolver.resolve("app:by_email:a@b.com")

      expect(store.runScript).toHaveBeenCalledWith(
        RESOLVE_SECONDARY_SCRIPT,
        ["app:by_email:a@b.com"],
        ["app:", NEGATIVE_MARKER],
      )
      expect(bytes.text(value)).toBe("record")
    })

    it("resolves through a memory store in one step", async () => {
      const store = new MemoryBackingStore({ clock: new FakeClock() })
      await store.set("app:by_email:a@b.com", bytes.of("u1"))
      await store.set("app:u1", bytes.of("record"))

      const value = await new SecondaryResolver(store, "app:").resolve("app:by_email:a@b.com")

      expect(bytes.text(value)).toBe("record")
    })
  })

  describe("enqueue", () => {
    it("queues the script on the caller's pipeline", () => {
      const pipeline = mock<BackingPipeline>()
      pipeline.runScript.mockReturnValue(pipeline)
      const resolver = new SecondaryResolver(mock<BackingStore>(), "")

      expect(resolver.enqueue(pipeline, "by_email:a@b.com")).toBe(pipeline)
      expect(pipeline.runScript).toHaveBeenCalledWith(
        RESOLVE_SECONDARY_SCRIPT,
        ["by_email:a@b.com"],
        ["", NEGATIVE_MARKER],
      )
    })
  })
})
