import type { Logger } from "@preflight/logger"
import { mock } from "vitest-mock-extended"
import { z } from "zod"
import { CliProvider } from "../../adapters/cli/cli-provider"
import { ObjectProvider } from "../../adapters/object/object-provider"
import type { ParamType } from "../../ports/param-type"
import type { ParamProvider } from "../../ports/provider"
import { FatalConfigError } from "../errors"
import { InitScheduler } from "../init-scheduler"
import { ParamRegistry } from "../param-registry"
import { createTypeRegistry } from "../type-registry"
import { structuredString } from "../types/builtin-types"

const JsonShape = z.object({ foo: z.string(), bar: z.number() })

describe("ParamRegistry", () => {
  let registry: ParamRegistry

  beforeEach(() => {
    registry = new ParamRegistry()
  })

  describe("parse", () => {
    it("fills slots from the provider", async () => {
      const s = registry.string("str", "default", "Some string")
      const i = registry.int("int", 5, "Some int")
      const big = registry.int64("big", 1n, "Some int64")
      const b = registry.bool("bool", false, "Some bool")
      const bf = registry.bool("bool-false", true, "Some bool")
      const d = registry.duration("dur", 10_000, "Some duration")
      const j = registry.json("json", { foo: "foo", bar: 5 }, "Some json", JsonShape)

      await registry.parse(
        new ObjectProvider({
          str: "hello",
          int: "8",
          big: "9007199254740993",
          bool: "true",
          "bool-false": "false",
          dur: "5m",
          json: '{"foo":"FOO","bar":10}',
        }),
      )

      expect(s.value).toBe("hello")
      expect(i.value).toBe(8)
      expect(big.value).toBe(9_007_199_254_740_993n)
      expect(b.value).toBe(true)
      expect(bf.value).toBe(false)
      expect(d.value).toBe(300_000)
      expect(j.value).toEqual({ foo: "FOO", bar: 10 })
    })

    it("falls back to defaults", async () => {
      const s = registry.string("str", "default", "Some string")
      const i = registry.int("int", 5, "Some int")
      const b = registry.bool("bool", true, "Some bool")
      const d = registry.duration("dur", 10_000, "Some duration")
      const j = registry.json("json", { foo: "foo", bar: 5 }, "Some json", JsonShape)
      const raw = registry.json("raw", [1, 2], "Untyped json")

      await registry.parse(new ObjectProvider({}))

      expect(s.value).toBe("default")
      expect(i.value).toBe(5)
      expect(b.value).toBe(true)
      expect(d.value).toBe(10_000)
      expect(j.value).toEqual({ foo: "foo", bar: 5 })
      expect(raw.value).toEqual([1, 2])
    })

    it("fills required params when provided", async () => {
      const s = registry.requiredString("str", "Some string")
      const i = registry.requiredInt("int", "Some int")
      const big = registry.requiredInt64("big", "Some int64")
      const b = registry.requiredBool("bool", "Some bool")
      const d = registry.requiredDuration("dur", "Some duration")
      const j = registry.requiredJson("json", "Some json", JsonShape)
      const raw = registry.requiredJson("raw", "Untyped json")

      await registry.parse(
        new ObjectProvider({
          str: "hello",
          int: "8",
          big: "-3",
          bool: "true",
          dur: "5h",
          json: '{"foo":"FOO","bar":10}',
          raw: "null",
        }),
      )

      expect(s.value).toBe("hello")
      expect(i.value).toBe(8)
      expect(big.value).toBe(-3n)
      expect(b.value).toBe(true)
      expect(d.value).toBe(18_000_000)
      expect(j.value).toEqual({ foo: "FOO", bar: 10 })
      expect(raw.value).toBeNull()
    })

    it("treats an empty provided value as set", async () => {
      const s = registry.string("str", "default", "")
      const r = registry.requiredString("req", "")

      await registry.parse(new ObjectProvider({ str: "", req: "" }))

      expect(s.value).toBe("")
      expect(r.value).toBe("")
    })

    it("rejects a missing required param", async () => {
      registry.requiredString("str", "Some string")

      const err = await registry.parse(new ObjectProvider({})).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(FatalConfigError)
      expect(err).toMatchObject({
        code: "param_required",
        message: 'parameter "str" required but not set',
        context: { param: "str" },
        isOperational: false,
      })
    })

    it("rejects a value its type cannot parse", async () => {
      registry.int("int", 5, "Some int")

      const err = await registry.parse(new ObjectProvider({ int: "abc" })).catch((e: unknown) => e)

      expect(err).toMatchObject({
        code: "param_invalid",
        message: 'error parsing parameter int: invalid integer "abc"',
        context: { param: "int" },
      })
      expect(err).toHaveProperty("cause.code", "value_invalid")
    })

    it("rejects JSON that does not match the schema", async () => {
      registry.json("json", { foo: "foo", bar: 5 }, "Some json", JsonShape)

      const err = await registry
        .parse(new ObjectProvider({ json: '{"foo":1,"bar":2}' }))
        .catch((e: unknown) => e)

      expect(err).toMatchObject({ code: "param_invalid", context: { param: "json" } })
      expect(err).toHaveProperty("cause.code", "value_invalid")
    })

    it("wraps provider failures", async () => {
      const provider = mock<ParamProvider>({ name: "flaky" })
      const cause = new Error("nope")
      provider.resolve.mockRejectedValue(cause)

      const err = await registry.parse(provider).catch((e: unknown) => e)

      expect(err).toMatchObject({
        code: "provider_failed",
        message: "provider flaky failed: nope",
        context: { provider: "flaky" },
        cause,
      })
    })

    it("hands the provider a snapshot of the declarations", async () => {
      const provider = mock<ParamProvider>({ name: "spy" })

      registry.string("a", "x", "first")
      registry.requiredInt("b", "second")
      provider.resolve.mockResolvedValue({ b: "1" })

      await registry.parse(provider)

      expect(provider.resolve).toHaveBeenCalledWith([
        { type: "string", name: "a", default: "x", usage: "first", required: false },
        { type: "int", name: "b", default: "", usage: "second", required: true },
      ])
    })

    it("reports where each value came from", async () => {
      registry.string("a", "x", "")
      registry.int("b", 1, "")
      await registry.onInit(() => {})

      const report = await registry.parse(new ObjectProvider({ a: "y", unrelated: "z" }))

      expect(report).toEqual({
        params: [
          { name: "a", origin: "provider" },
          { name: "b", origin: "default" },
        ],
        callbacks: 1,
      })
    })

    it("clears declarations after a pass, even a failed one", async () => {
      registry.requiredString("str", "")
      await registry.parse(new ObjectProvider({})).catch(() => undefined)

      expect(registry.params()).toEqual([])

      const s = registry.string("str", "again", "")
      await registry.parse(new ObjectProvider({}))

      expect(s.value).toBe("again")
    })

    it("refuses a second concurrent pass", async () => {
      let release: (values: Record<string, string>) => void = () => {}
      const slow: ParamProvider = {
        name: "slow",
        resolve: () =>
          new Promise((resolve) => {
            release = resolve
          }),
      }
      const s = registry.string("str", "default", "")

      const first = registry.parse(slow)
      const second = await registry.parse(new ObjectProvider({})).catch((e: unknown) => e)

      expect(second).toMatchObject({ code: "resolution_in_progress" })

      release({ str: "late" })
      await first

      expect(s.value).toBe("late")
    })

    it("does not run init callbacks when resolution fails", async () => {
      const cb = vi.fn()
      registry.requiredString("str", "")
      await registry.onInit(cb)

      await registry.parse(new ObjectProvider({})).catch(() => undefined)

      expect(cb).not.toHaveBeenCalled()
    })

    it("surfaces init callback failures", async () => {
      await registry.onInit(() => {
        throw new Error("db unreachable")
      })

      const err = await registry.parse(new ObjectProvider({})).catch((e: unknown) => e)

      expect(err).toMatchObject({ code: "init_failed" })
      expect(err).toHaveProperty("cause.message", "db unreachable")
    })

    it("keeps the bool default flip of the command line", async () => {
      const verbose = registry.bool("verbose", true, "")
      const quiet = registry.bool("quiet", false, "")

      await registry.parse(new CliProvider({ argv: ["--verbose", "--quiet"] }))

      expect(verbose.value).toBe(false)
      expect(quiet.value).toBe(true)
    })
  })

  describe("declarations", () => {
    it("returns the existing slot for an identical redeclaration", async () => {
      expect(registry.string("x", "d", "u")).toBe(registry.string("x", "d", "u"))

      const a = registry.int("port", 80, "listen port")
      const b = registry.int("port", 80, "listen port")

      expect(b).toBe(a)
      expect(registry.params()).toHaveLength(2)

      await registry.parse(new ObjectProvider({ port: "8080" }))

      expect(a.value).toBe(8080)
    })

    it("shares one decoded JSON value between identical redeclarations", async () => {
      const a = registry.json("shape", { foo: "a", bar: 1 }, "shape", JsonShape)
      const b = registry.json("shape", { foo: "a", bar: 1 }, "shape", JsonShape)

      expect(b).toBe(a)

      await registry.parse(new ObjectProvider({ shape: '{"foo":"x","bar":2}' }))

      expect(b.value).toBe(a.value)
      expect(a.value).toEqual({ foo: "x", bar: 2 })
    })

    it("returns the typed slot when the same param is declared by tag", () => {
      const port = registry.int("port", 80, "listen port")
      const byTag = registry.declare({ type: "int", name: "port", default: "80", usage: "listen port", required: false })

      expect(byTag).toBe(port)
    })

    it("rejects an identical JSON redeclaration that decodes differently", () => {
      registry.json("shape", { foo: "a", bar: 1 }, "shape", JsonShape)

      expect(() => registry.json("shape", { foo: "a", bar: 1 }, "shape")).toThrow(
        'parameter "shape" redeclared with a different value type',
      )
    })

    it.each([
      ["type", (r: ParamRegistry) => r.string("port", "80", "listen port")],
      ["default", (r: ParamRegistry) => r.int("port", 81, "listen port")],
      ["usage", (r: ParamRegistry) => r.int("port", 80, "other")],
      ["required", (r: ParamRegistry) => r.requiredInt("port", "listen port")],
    ])("rejects a redeclaration with a different %s", (_field, redeclare) => {
      registry.int("port", 80, "listen port")

      expect(() => redeclare(registry)).toThrow(FatalConfigError)
      expect(() => redeclare(registry)).toThrow('parameter "port" redeclared with a different definition')
    })

    it("declares by tag", async () => {
      const n = registry.declare({ type: "int", name: "n", default: "3", usage: "", required: false })

      await registry.parse(new ObjectProvider({}))

      expect(n.value).toBe(3)
    })

    it("rejects unknown tags", () => {
      expect(() =>
        registry.declare({ type: "nope", name: "n", default: "", usage: "", required: false }),
      ).toThrow("param type not defined: nope")
    })

    it("rejects declarations while resolving", async () => {
      await registry.onInit(() => {
        registry.string("late", "", "")
      })

      const err = await registry.parse(new ObjectProvider({})).catch((e: unknown) => e)

      expect(err).toMatchObject({ code: "init_failed" })
      expect(err).toHaveProperty("cause.code", "resolution_in_progress")
    })

    it("returns a snapshot from params()", () => {
      registry.string("a", "", "")

      const snapshot = registry.params()
      registry.string("b", "", "")

      expect(snapshot.map((p) => p.name)).toEqual(["a"])
    })
  })

  describe("custom types", () => {
    const upper: ParamType<string> = {
      tag: "upper",
      parse: (raw) => raw.toUpperCase(),
      format: (value) => value.toLowerCase(),
      fromStructured: structuredString,
    }

    it("declares params of a registered type", async () => {
      const custom = new ParamRegistry({ types: createTypeRegistry([upper]) })
      const region = custom.custom(upper, "region", "EU", "")
      const zone = custom.requiredCustom(upper, "zone", "")

      expect(custom.params()[0]).toMatchObject({ type: "upper", default: "eu" })

      await custom.parse(new ObjectProvider({ zone: "a1" }))

      expect(region.value).toBe("EU")
      expect(zone.value).toBe("A1")
    })

    it("rejects a type the registry does not own", () => {
      expect(() => registry.custom(upper, "region", "eu", "")).toThrow(
        "param type not registered: upper",
      )
    })
  })

  describe("init callbacks", () => {
    it("runs them in registration order, nested ones at the tail, inline once closed", async () => {
      let i = 0
      const step = (expected: number) => {
        expect(i).toBe(expected)
        i++
      }

      await registry.onInit(() => {
        step(0)
        void registry.onInit(() => step(2))
      })
      await registry.onInit(() => {
        step(1)
        void registry.onInit(() => {
          step(3)
          void registry.onInit(() => step(4))
        })
      })

      const report = await registry.parse(new ObjectProvider({}))

      expect(report.callbacks).toBe(5)
      expect(i).toBe(5)

      await registry.onInit(() => {
        step(5)
        void registry.onInit(() => step(6))
      })

      expect(i).toBe(7)
    })

    it("sees resolved values", async () => {
      const port = registry.int("port", 80, "")
      let seen: number | undefined

      await registry.onInit(() => {
        seen = port.value
      })
      await registry.parse(new ObjectProvider({ port: "9000" }))

      expect(seen).toBe(9000)
    })

    it("shares an injected scheduler", async () => {
      const scheduler = new InitScheduler()
      const cb = vi.fn()
      await scheduler.register(cb)

      await new ParamRegistry({ scheduler }).parse(new ObjectProvider({}))

      expect(cb).toHaveBeenCalledTimes(1)
      expect(scheduler.state).toBe("closed")
    })
  })

  describe("reset", () => {
    it("clears declarations and reopens the scheduler", async () => {
      registry.string("a", "", "")
      await registry.parse(new ObjectProvider({}))

      registry.string("b", "", "")
      registry.reset()

      const cb = vi.fn()
      await registry.onInit(cb)

      expect(registry.params()).toEqual([])
      expect(cb).not.toHaveBeenCalled()

      await registry.parse(new ObjectProvider({}))

      expect(cb).toHaveBeenCalledTimes(1)
    })

    it("leaves existing slots readable", async () => {
      const a = registry.string("a", "x", "")
      await registry.parse(new ObjectProvider({}))

      registry.reset()

      expect(a.value).toBe("x")
    })

    it("is refused during a pass", async () => {
      let err: unknown

      await registry.onInit(() => {
        try {
          registry.reset()
        } catch (e) {
          err = e
        }
      })
      await registry.parse(new ObjectProvider({}))

      expect(err).toMatchObject({ code: "resolution_in_progress" })
    })
  })

  describe("logging", () => {
    it("logs through a params child logger", async () => {
      const logger = mock<Logger>()
      const child = mock<Logger>()
      logger.child.mockReturnValue(child)
      child.child.mockReturnValue(child)

      const logged = new ParamRegistry({ logger })
      logged.requiredString("str", "")

      await logged.parse(new ObjectProvider({}, "stub")).catch(() => undefined)

      expect(logger.child).toHaveBeenCalledWith({ module: "params" })
      expect(child.debug).toHaveBeenCalledWith("Parameter declared", { param: "str", type: "string" })
      expect(child.child).toHaveBeenCalledWith({ generation: 1, provider: "stub" })
      expect(child.info).toHaveBeenCalledWith("Resolving parameters", { count: 1 })
      expect(child.error).toHaveBeenCalledWith("Resolution failed", {
        err: expect.objectContaining({ code: "param_required" }),
      })
    })
  })
})
