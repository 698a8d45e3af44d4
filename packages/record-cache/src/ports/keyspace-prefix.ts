/**
 * A prefix that scopes a cache instance to a partition of a shared Redis
 * database (e.g. `app:prod:users:`).
 *
 * @remarks
 * The prefix is prepended to every primary and secondary key the cache reads
 * or writes. Index entries store the unprefixed primary id, and the
 * resolution script applies the prefix on the server.
 */
export type KeyspacePrefix = string
