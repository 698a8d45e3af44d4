import { createClient, RESP_TYPES } from "redis"
import type { ServerIdentity } from "../../ports/server-identity"

export type RedisSetOptions = { EX: number }

export type RedisEvalOptions = {
  keys: string[]
  arguments: string[]
}

export type RedisBytesMulti = {
  set(key: string, value: Uint8Array | Buffer, opts?: RedisSetOptions): RedisBytesMulti
  eval(script: string, opts: RedisEvalOptions): RedisBytesMulti
  execAsPipeline(): Promise<unknown[]>
}

/** The node-redis surface the cache uses, with blob strings mapped to Buffer. */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>
  set(key: string, value: Uint8Array | Buffer, opts?: RedisSetOptions): Promise<unknown>
  eval(script: string, opts: RedisEvalOptions): Promise<unknown>
  multi(): RedisBytesMulti

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export function createRedisBytesClient(identity: ServerIdentity): RedisBytesClient {
  return createClient({
    socket: { host: identity.host, port: identity.port },
    database: identity.db,
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

/** Default connector for the connection registry. */
export async function connectRedisBytesClient(
  identity: ServerIdentity,
): Promise<RedisBytesClient> {
  const client = createRedisBytesClient(identity)
  await client.connect()

  return client
}
