import { mock } from "vitest-mock-extended"
import { ConnectionRegistry } from "../../../core/connection-registry"
import { RecordCacheError } from "../../../core/errors/record-cache-error"
import { userCodec, users } from "../../../tests/utils/record-cache-test-helpers"
import { createRecordCache } from "../create"
import type { RedisBytesClient } from "../redis-client"

describe("createRecordCache", () => {
  it("routes caches with the same server identity through one connection", async () => {
    const client = mock<RedisBytesClient>()
    client.get.mockResolvedValue(null)
    const connect = vi.fn(async () => client)
    const registry = new ConnectionRegistry<RedisBytesClient>()

    const usersCache = await createRecordCache({
      config: { keyspacePrefix: "users:", server: { host: "cache.internal" } },
      codec: userCodec(),
      registry,
      connect,
    })
    const sessionsCache = await createRecordCache({
      config: { keyspacePrefix: "sessions:", server: { host: "cache.internal", port: 6379 } },
      codec: userCodec(),
      registry,
      connect,
    })

    await usersCache.fetch("u1")
    await sessionsCache.fetch("s1")

    expect(connect).toHaveBeenCalledTimes(1)
    expect(connect).toHaveBeenCalledWith({ host: "cache.internal", port: 6379, db: 0 })
    expect(client.get.mock.calls).toStrictEqual([["users:u1"], ["sessions:s1"]])
  })

  it("opens a separate connection per database", async () => {
    const connect = vi.fn(async () => mock<RedisBytesClient>())
    const registry = new ConnectionRegistry<RedisBytesClient>()

    await createRecordCache({ config: { server: { db: 1 } }, codec: userCodec(), registry, connect })
    await createRecordCache({ config: { server: { db: 2 } }, codec: userCodec(), registry, connect })

    expect(connect).toHaveBeenCalledTimes(2)
    expect(registry.size).toBe(2)
  })

  it("rejects an invalid configuration before connecting", async () => {
    const connect = vi.fn(async () => mock<RedisBytesClient>())
    const registry = new ConnectionRegistry<RedisBytesClient>()

    await expect(
      createRecordCache({
        config: { indexes: [{ name: "by_email", fields: [] }] },
        codec: userCodec(),
        registry,
        connect,
      }),
    ).rejects.toBeInstanceOf(RecordCacheError)

    expect(connect).not.toHaveBeenCalled()
  })

  it("stores through the shared connection", async () => {
    const client = mock<RedisBytesClient>()
    client.set.mockResolvedValue("OK")
    const registry = new ConnectionRegistry<RedisBytesClient>()

    const cache = await createRecordCache({
      config: { ttl: 60 },
      codec: userCodec(),
      registry,
      connect: async () => client,
    })

    await expect(cache.store("u1", users.ada())).resolves.toBe(true)

    expect(client.set).toHaveBeenCalledTimes(1)
    expect(client.set.mock.calls[0]?.[0]).toBe("u1")
    expect(client.set.mock.calls[0]?.[2]).toStrictEqual({ EX: 60 })
  })
})
