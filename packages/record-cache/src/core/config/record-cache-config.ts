import { z } from "zod"
import type { RecordCacheConfig } from "../../ports/record-cache-config"
import { RecordCacheError } from "../errors/record-cache-error"

export const DEFAULT_SERVER = { host: "localhost", port: 6379, db: 0 } as const

const fieldsSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)], {
  error: "fields must be a non-empty string or a non-empty list of strings",
})

const indexSchema = z.object(
  {
    name: z.string({ error: "name must be a string" }).min(1, "name must not be empty"),
    fields: fieldsSchema,
  },
  { error: "index definition must be an object" },
)

export const recordCacheConfigSchema = z
  .object(
    {
      ttl: z
        .number({ error: "ttl must be a number of seconds" })
        .int("ttl must be an integer")
        .nonnegative("ttl must not be negative")
        .nullish()
        .transform((ttl) => ttl ?? 0),
      server: z
        .object({
          host: z.string().min(1).default(DEFAULT_SERVER.host),
          port: z.number().int().min(1).max(65535).default(DEFAULT_SERVER.port),
          db: z.number().int().nonnegative().default(DEFAULT_SERVER.db),
        })
        .default({ ...DEFAULT_SERVER }),
      keyspacePrefix: z.string().default(""),
      indexes: z
        .array(indexSchema, { error: "indexes must be a list of index definitions" })
        .default([]),
    },
    { error: "cache configuration must be an object" },
  )
  .superRefine((config, ctx) => {
    const seen = new Set<string>()

    for (const [position, index] of config.indexes.entries()) {
      if (seen.has(index.name)) {
        ctx.addIssue({
          code: "custom",
          message: `duplicate index name "${index.name}"`,
          path: ["indexes", position, "name"],
        })
      }
      seen.add(index.name)
    }
  })

/**
 * Validates a cache configuration and applies defaults. Single-field indexes
 * given as a string are normalised to a one-element list.
 */
export function parseRecordCacheConfig(input: unknown): RecordCacheConfig {
  const result = recordCacheConfigSchema.safeParse(input)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))
    const [first] = issues

    throw RecordCacheError.configuration({
      path: first?.path ?? "conf",
      message: first?.message ?? z.prettifyError(result.error),
      issues,
    })
  }

  const { ttl, server, keyspacePrefix, indexes } = result.data

  return {
    ttl,
    server,
    keyspacePrefix,
    indexes: indexes.map(({ name, fields }) => ({
      name,
      fields: typeof fields === "string" ? [fields] : fields,
    })),
  }
}

function formatPath(path: readonly PropertyKey[]): string {
  return path.reduce<string>(
    (out, segment) =>
      typeof segment === "number" ? `${out}[${segment}]` : `${out}.${String(segment)}`,
    "conf",
  )
}
