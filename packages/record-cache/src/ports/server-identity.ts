/**
 * Identifies one logical Redis database. Caches with equal identities share a
 * single connection.
 */
export type ServerIdentity = Readonly<{
  host: string
  port: number
  db: number
}>

export function serverIdentityKey(identity: ServerIdentity): string {
  return `${identity.host}:${identity.port}/${identity.db}`
}
