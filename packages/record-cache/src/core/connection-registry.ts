import { createNullLogger, type Logger } from "@recache/logger"
import { type ServerIdentity, serverIdentityKey } from "../ports/server-identity"

export type Connect<TConnection> = (
  identity: ServerIdentity,
) => Promise<TConnection> | TConnection

export type ConnectionRegistryDeps = {
  logger?: Logger
}

/**
 * Holds at most one connection per server identity for the lifetime of the
 * registry.
 *
 * @remarks
 * Concurrent first calls for the same identity share one `connect` call. A
 * failed `connect` rejects every waiter and is not remembered, so a later
 * call tries again. The registry never closes connections; callers iterate
 * `connections()` at shutdown.
 */
export class ConnectionRegistry<TConnection> {
  private readonly established = new Map<string, { connection: TConnection }>()
  private readonly pending = new Map<string, Promise<TConnection>>()
  private readonly logger: Logger

  constructor(deps: ConnectionRegistryDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "connection-registry" })
  }

  async getOrCreate(
    identity: ServerIdentity,
    connect: Connect<TConnection>,
  ): Promise<TConnection> {
    const key = serverIdentityKey(identity)

    const existing = this.established.get(key)
    if (existing) {
      this.logger.debug("Reusing connection", { server: key })
      return existing.connection
    }

    const inflight = this.pending.get(key)
    if (inflight) return inflight

    const flight = this.open(key, identity, connect)
    this.pending.set(key, flight)

    try {
      return await flight
    } finally {
      this.pending.delete(key)
    }
  }

  has(identity: ServerIdentity): boolean {
    return this.established.has(serverIdentityKey(identity))
  }

  get size(): number {
    return this.established.size
  }

  /** Established connections keyed by `host:port/db`. */
  connections(): [string, TConnection][] {
    return [...this.established].map(([key, { connection }]): [string, TConnection] => [key, connection])
  }

  private async open(
    key: string,
    identity: ServerIdentity,
    connect: Connect<TConnection>,
  ): Promise<TConnection> {
    try {
      const connection = await connect(identity)
      this.established.set(key, { connection })
      this.logger.info("Connection established", { server: key })

      return connection
    } catch (err) {
      this.logger.error("Connection failed", { server: key, err })
      throw err
    }
  }
}
