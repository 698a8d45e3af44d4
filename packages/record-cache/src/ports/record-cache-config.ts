import type { Seconds } from "@recache/clock"
import type { IndexDefinition, IndexDefinitionInput } from "./index-definition"
import type { KeyspacePrefix } from "./keyspace-prefix"
import type { ServerIdentity } from "./server-identity"

export type RecordCacheConfigInput = {
  /** Expiry for every write, in seconds. `0` or unset means no expiry. */
  ttl?: Seconds | null
  server?: Partial<ServerIdentity>
  keyspacePrefix?: KeyspacePrefix
  indexes?: readonly IndexDefinitionInput[]
}

export type RecordCacheConfig = Readonly<{
  ttl: Seconds
  server: ServerIdentity
  keyspacePrefix: KeyspacePrefix
  indexes: readonly IndexDefinition[]
}>
