import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns a copy of the whole environment without a prefix", async () => {
    const env = { REDIS_HOST: "localhost", HOME: "/root" }

    const values = await new EnvSource({ env }).load()

    expect(values).toStrictEqual(env)
    expect(values).not.toBe(env)
  })

  it("keeps only prefixed keys and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "CACHE_",
      env: { CACHE_TTL: "60", CACHE_REDIS_DB: "2", OTHER: "x" },
    })

    await expect(source.load()).resolves.toStrictEqual({ TTL: "60", REDIS_DB: "2" })
  })

  it("skips blank values so defaults still apply", async () => {
    const source = new EnvSource({
      env: { REDIS_HOST: "", REDIS_PORT: "  ", REDIS_DB: "1", UNSET: undefined },
    })

    await expect(source.load()).resolves.toStrictEqual({ REDIS_DB: "1" })
  })

  it("defaults to process.env", async () => {
    vi.stubEnv("RECACHE_ENV_SOURCE_PROBE", "yes")

    const values = await new EnvSource({ prefix: "RECACHE_ENV_SOURCE_" }).load()

    expect(values).toStrictEqual({ PROBE: "yes" })

    vi.unstubAllEnvs()
  })
})
