import { ConfigError } from "../../../core/errors"
import { ParamTypes } from "../../../ports/param"
import { param } from "../../../ports/__tests__/declarations"
import { EnvProvider } from "../env-provider"

describe("EnvProvider behavior", () => {
  it("maps names to upper snake case", async () => {
    const provider = new EnvProvider({
      env: { DB_POOL_SIZE: "10", TLS: "true" },
    })

    const result = await provider.resolve([
      param("db-pool-size", { type: ParamTypes.Int }),
      param("tls", { type: ParamTypes.Bool }),
    ])

    expect(result).toEqual({ "db-pool-size": "10", tls: "true" })
  })

  it("applies the prefix", async () => {
    const provider = new EnvProvider({
      prefix: "APP_",
      env: { APP_PORT: "3000", PORT: "ignored" },
    })

    expect(await provider.resolve([param("port")])).toEqual({ port: "3000" })
  })

  it("skips undefined values but keeps empty strings", async () => {
    const provider = new EnvProvider({ env: { A: undefined, B: "" } })

    expect(await provider.resolve([param("a"), param("b")])).toEqual({ b: "" })
  })

  it("accepts KEY=VALUE entries", async () => {
    const provider = new EnvProvider({
      env: ["A=1", "B=x=y", "C=", "A=2"],
    })

    const result = await provider.resolve([param("a"), param("b"), param("c")])

    expect(result).toEqual({ a: "2", b: "x=y", c: "" })
  })

  it("rejects an entry without '='", async () => {
    const provider = new EnvProvider({ env: ["A=1", "BROKEN"] })

    const err = await provider.resolve([param("a")]).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConfigError)
    expect(err).toMatchObject({ code: "provider_malformed" })
  })

  it("does not read process.env when env is injected", async () => {
    const provider = new EnvProvider({ env: {} })

    expect(await provider.resolve([param("path")])).toEqual({})
  })
})
