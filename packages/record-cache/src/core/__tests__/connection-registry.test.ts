import type { Logger } from "@recache/logger"
import { mock } from "vitest-mock-extended"
import { ConnectionRegistry } from "../connection-registry"

type FakeConnection = { id: number }

const primary = { host: "localhost", port: 6379, db: 0 }

describe("ConnectionRegistry", () => {
  let created: number
  let registry: ConnectionRegistry<FakeConnection>

  const connect = async (): Promise<FakeConnection> => {
    created++
    return { id: created }
  }

  beforeEach(() => {
    created = 0
    registry = new ConnectionRegistry<FakeConnection>()
  })

  it("returns the same connection for equal identities", async () => {
    const first = await registry.getOrCreate(primary, connect)
    const second = await registry.getOrCreate({ ...primary }, connect)

    expect(second).toBe(first)
    expect(created).toBe(1)
    expect(registry.has(primary)).toBe(true)
  })

  it("keeps separate connections for different hosts, ports and databases", async () => {
    await registry.getOrCreate(primary, connect)
    await registry.getOrCreate({ ...primary, host: "replica" }, connect)
    await registry.getOrCreate({ ...primary, port: 6380 }, connect)
    await registry.getOrCreate({ ...primary, db: 3 }, connect)

    expect(created).toBe(4)
    expect(registry.connections().map(([key]) => key)).toStrictEqual([
      "localhost:6379/0",
      "replica:6379/0",
      "localhost:6380/0",
      "localhost:6379/3",
    ])
  })

  it("shares one connect call between concurrent first callers", async () => {
    const [a, b, c] = await Promise.all([
      registry.getOrCreate(primary, connect),
      registry.getOrCreate(primary, connect),
      registry.getOrCreate(primary, connect),
    ])

    expect(created).toBe(1)
    expect(b).toBe(a)
    expect(c).toBe(a)
    expect(registry.size).toBe(1)
  })

  it("does not remember a failed connect", async () => {
    const failing = vi.fn(async (): Promise<FakeConnection> => {
      throw new Error("ECONNREFUSED")
    })

    await expect(registry.getOrCreate(primary, failing)).rejects.toThrow("ECONNREFUSED")
    expect(registry.has(primary)).toBe(false)

    await expect(registry.getOrCreate(primary, connect)).resolves.toStrictEqual({ id: 1 })
  })

  it("passes the identity to the connector", async () => {
    const connector = vi.fn(async () => ({ id: 7 }))

    await registry.getOrCreate({ host: "cache", port: 7000, db: 2 }, connector)

    expect(connector).toHaveBeenCalledWith({ host: "cache", port: 7000, db: 2 })
  })

  it("logs creation at info and reuse at debug", async () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    const logged = new ConnectionRegistry<FakeConnection>({ logger })

    await logged.getOrCreate(primary, connect)
    await logged.getOrCreate(primary, connect)

    expect(logger.child).toHaveBeenCalledWith({ module: "connection-registry" })
    expect(logger.info).toHaveBeenCalledWith("Connection established", {
      server: "localhost:6379/0",
    })
    expect(logger.debug).toHaveBeenCalledWith("Reusing connection", {
      server: "localhost:6379/0",
    })
  })
})
