/**
 * Validated configuration plus where it came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_PORT: z.coerce.number().default(6379) }),
 *   sources: [new EnvSource()],
 * })
 *
 * config.value.REDIS_PORT   // 6379
 * config.sourcesUsed()      // [] when every key fell back to its default
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Names of the sources that provided at least one final value. */
  sourcesUsed(): string[]
}
