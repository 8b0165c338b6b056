import { type Logger, NullLogger } from "@preflight/logger"
import { type ZodType, z } from "zod"
import { type ParamDeclaration, type ParamSlot, ParamTypes, sameDeclaration } from "../ports/param"
import type { ParamType } from "../ports/param-type"
import type { ParamProvider, ProviderResult } from "../ports/provider"
import type { Milliseconds } from "./duration"
import { FatalConfigError, invalidValue } from "./errors"
import { type InitCallback, InitScheduler } from "./init-scheduler"
import { type SlotCodec, WritableSlot } from "./slot"
import { createTypeRegistry, type TypeRegistry } from "./type-registry"
import {
  boolType,
  durationType,
  int64Type,
  intType,
  jsonType,
  stringType,
} from "./types/builtin-types"

export type ParamRegistryDeps = {
  /** @default createTypeRegistry() */
  types?: TypeRegistry
  logger?: Logger
  /** Shared scheduler, for callers that register init work elsewhere. */
  scheduler?: InitScheduler
}

export type ParamOrigin = "provider" | "default"

export type ResolvedParam = Readonly<{
  name: string
  origin: ParamOrigin
}>

/**
 * Outcome of a successful {@link ParamRegistry.parse}.
 */
export type ResolutionReport = Readonly<{
  params: readonly ResolvedParam[]
  /** Init callbacks run during the drain */
  callbacks: number
}>

type Entry = {
  declaration: ParamDeclaration
  slot: WritableSlot<unknown>
}

/**
 * Declared parameters plus the pass that resolves them.
 *
 * Declare everything, register init work with {@link onInit}, then call
 * {@link parse} once with the provider chain. After a pass the declarations
 * are cleared; slots keep their values.
 *
 * @example
 * ```ts
 * const registry = new ParamRegistry()
 * const port = registry.int("port", 8080, "listen port")
 *
 * await registry.onInit(() => server.listen(port.value))
 *
 * await registry.parse(new CompositeProvider([new EnvProvider(), new CliProvider()]))
 * ```
 */
export class ParamRegistry {
  private readonly entries = new Map<string, Entry>()
  private readonly logger: Logger
  private readonly scheduler: InitScheduler
  private readonly typeRegistry: TypeRegistry
  private resolving = false
  private generation = 0

  constructor(deps: ParamRegistryDeps = {}) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "params" })
    this.typeRegistry = deps.types ?? createTypeRegistry()
    this.scheduler = deps.scheduler ?? new InitScheduler({ logger: deps.logger })
  }

  get types(): TypeRegistry {
    return this.typeRegistry
  }

  string(name: string, defaultValue: string, usage: string): ParamSlot<string> {
    return this.builtin(stringType, name, stringType.format(defaultValue), usage, false)
  }

  requiredString(name: string, usage: string): ParamSlot<string> {
    return this.builtin(stringType, name, "", usage, true)
  }

  int(name: string, defaultValue: number, usage: string): ParamSlot<number> {
    return this.builtin(intType, name, intType.format(defaultValue), usage, false)
  }

  requiredInt(name: string, usage: string): ParamSlot<number> {
    return this.builtin(intType, name, "", usage, true)
  }

  int64(name: string, defaultValue: bigint, usage: string): ParamSlot<bigint> {
    return this.builtin(int64Type, name, int64Type.format(defaultValue), usage, false)
  }

  requiredInt64(name: string, usage: string): ParamSlot<bigint> {
    return this.builtin(int64Type, name, "", usage, true)
  }

  bool(name: string, defaultValue: boolean, usage: string): ParamSlot<boolean> {
    return this.builtin(boolType, name, boolType.format(defaultValue), usage, false)
  }

  requiredBool(name: string, usage: string): ParamSlot<boolean> {
    return this.builtin(boolType, name, "", usage, true)
  }

  duration(name: string, defaultValue: Milliseconds, usage: string): ParamSlot<Milliseconds> {
    return this.builtin(durationType, name, durationType.format(defaultValue), usage, false)
  }

  requiredDuration(name: string, usage: string): ParamSlot<Milliseconds> {
    return this.builtin(durationType, name, "", usage, true)
  }

  /**
   * A JSON document. With a `schema` the decoded value is validated and the
   * slot holds the schema's output.
   */
  json(name: string, defaultValue: unknown, usage: string): ParamSlot<unknown>
  json<T>(name: string, defaultValue: T, usage: string, schema: ZodType<T>): ParamSlot<T>
  json<T>(
    name: string,
    defaultValue: T,
    usage: string,
    schema?: ZodType<T>,
  ): ParamSlot<T> | ParamSlot<unknown> {
    const declaration = this.declaration(ParamTypes.Json, name, jsonType.format(defaultValue), usage, false)

    return schema ? this.add(declaration, new SchemaCodec(schema)) : this.add(declaration, jsonType)
  }

  requiredJson(name: string, usage: string): ParamSlot<unknown>
  requiredJson<T>(name: string, usage: string, schema: ZodType<T>): ParamSlot<T>
  requiredJson<T>(name: string, usage: string, schema?: ZodType<T>): ParamSlot<T> | ParamSlot<unknown> {
    const declaration = this.declaration(ParamTypes.Json, name, "", usage, true)

    return schema ? this.add(declaration, new SchemaCodec(schema)) : this.add(declaration, jsonType)
  }

  /**
   * A parameter of a registered custom type. `type` must be the instance
   * registered with {@link TypeRegistry.register}.
   */
  custom<T>(type: ParamType<T>, name: string, defaultValue: T, usage: string): ParamSlot<T> {
    this.assertOwned(type)

    return this.builtin(type, name, type.format(defaultValue), usage, false)
  }

  requiredCustom<T>(type: ParamType<T>, name: string, usage: string): ParamSlot<T> {
    this.assertOwned(type)

    return this.builtin(type, name, "", usage, true)
  }

  /**
   * Untyped declaration by tag, for callers that build declarations from
   * data. An identical redeclaration returns the existing slot whatever it
   * decodes to.
   */
  declare(declaration: ParamDeclaration): ParamSlot<unknown> {
    const copy = { ...declaration }
    const type = this.typeRegistry.get(copy.type)

    return this.existing(copy) ?? this.create(copy, type)
  }

  /** Snapshot of the current declarations, in declaration order. */
  params(): ParamDeclaration[] {
    return [...this.entries.values()].map((entry) => entry.declaration)
  }

  /** See {@link InitScheduler.register}. */
  onInit(callback: InitCallback): Promise<void> {
    return this.scheduler.register(callback)
  }

  /**
   * Resolves every declared parameter through `provider`, fills the slots,
   * then drains the init callbacks.
   *
   * Rejects with a {@link FatalConfigError} on the first problem. The
   * declarations are cleared either way.
   */
  async parse(provider: ParamProvider): Promise<ResolutionReport> {
    if (this.resolving) {
      throw new FatalConfigError("resolution_in_progress", "a resolution pass is already running")
    }

    this.resolving = true
    this.generation++

    const logger = this.logger.child({ generation: this.generation, provider: provider.name })
    const started = Date.now()

    try {
      const entries = [...this.entries.values()]

      logger.info("Resolving parameters", { count: entries.length })

      const values = await this.resolveWith(provider, entries)
      const params = entries.map((entry) => this.fill(entry, values))

      logger.debug("Parameters resolved", { count: params.length })

      const callbacks = await this.scheduler.drain()

      logger.info("Resolution complete", { callbacks, durationMs: Date.now() - started })

      return { params, callbacks }
    } catch (err) {
      logger.error("Resolution failed", { err })
      throw err
    } finally {
      this.entries.clear()
      this.resolving = false
    }
  }

  /**
   * Forgets every declaration and resets the scheduler. Existing slots keep
   * whatever they hold.
   */
  reset(): void {
    if (this.resolving) {
      throw new FatalConfigError("resolution_in_progress", "cannot reset during a resolution pass")
    }

    this.scheduler.reset()
    this.entries.clear()
    this.logger.debug("Registry reset")
  }

  private async resolveWith(
    provider: ParamProvider,
    entries: readonly Entry[],
  ): Promise<ProviderResult> {
    try {
      return await provider.resolve(entries.map((entry) => entry.declaration))
    } catch (err) {
      throw new FatalConfigError("provider_failed", `provider ${provider.name} failed: ${messageOf(err)}`, {
        cause: err,
        context: { provider: provider.name },
      })
    }
  }

  private fill({ declaration, slot }: Entry, values: ProviderResult): ResolvedParam {
    const { name } = declaration
    const provided = Object.hasOwn(values, name) ? values[name] : undefined

    if (provided === undefined && declaration.required) {
      throw new FatalConfigError("param_required", `parameter "${name}" required but not set`, {
        context: { param: name },
      })
    }

    const raw = provided ?? declaration.default

    try {
      slot.fill(raw)
    } catch (err) {
      throw new FatalConfigError("param_invalid", `error parsing parameter ${name}: ${messageOf(err)}`, {
        cause: err,
        context: { param: name },
      })
    }

    return { name, origin: provided === undefined ? "default" : "provider" }
  }

  private builtin<T>(
    type: ParamType<T>,
    name: string,
    defaultValue: string,
    usage: string,
    required: boolean,
  ): ParamSlot<T> {
    return this.add(this.declaration(type.tag, name, defaultValue, usage, required), type)
  }

  private declaration(
    type: string,
    name: string,
    defaultValue: string,
    usage: string,
    required: boolean,
  ): ParamDeclaration {
    return { type, name, default: defaultValue, usage, required }
  }

  /**
   * Declares a new slot, or returns the one already declared under the same
   * name. The existing slot is only handed back when it decodes the same way,
   * so its value type matches the caller's.
   */
  private add<T>(declaration: ParamDeclaration, codec: SlotCodec<T>): ParamSlot<T> {
    const slot = this.existing(declaration)

    if (slot === undefined) return this.create(declaration, codec)

    if (!decodesWith(slot, codec)) {
      throw new FatalConfigError(
        "param_conflict",
        `parameter "${declaration.name}" redeclared with a different value type`,
        { context: { param: declaration.name } },
      )
    }

    return slot
  }

  private existing(declaration: ParamDeclaration): WritableSlot<unknown> | undefined {
    const { name } = declaration

    if (this.resolving) {
      throw new FatalConfigError(
        "resolution_in_progress",
        `cannot declare parameter "${name}" during a resolution pass`,
        { context: { param: name } },
      )
    }

    this.typeRegistry.get(declaration.type)

    const entry = this.entries.get(name)

    if (entry && !sameDeclaration(entry.declaration, declaration)) {
      throw new FatalConfigError(
        "param_conflict",
        `parameter "${name}" redeclared with a different definition`,
        { context: { param: name } },
      )
    }

    return entry?.slot
  }

  private create<T>(declaration: ParamDeclaration, codec: SlotCodec<T>): WritableSlot<T> {
    const slot = new WritableSlot(declaration.name, codec)

    this.entries.set(declaration.name, { declaration, slot })
    this.logger.debug("Parameter declared", { param: declaration.name, type: declaration.type })

    return slot
  }

  private assertOwned(type: ParamType<unknown>): void {
    if (!this.typeRegistry.owns(type)) {
      throw new FatalConfigError("type_unknown", `param type not registered: ${type.tag}`, {
        context: { type: type.tag },
      })
    }
  }
}

/** Decodes a JSON param and validates it against a zod schema. */
class SchemaCodec<T> implements SlotCodec<T> {
  constructor(readonly schema: ZodType<T>) {}

  parse(raw: string): T {
    const result = this.schema.safeParse(jsonType.parse(raw))

    if (!result.success) {
      throw invalidValue(z.prettifyError(result.error), raw, result.error)
    }

    return result.data
  }
}

function decodesWith<T>(slot: WritableSlot<unknown>, codec: SlotCodec<T>): slot is WritableSlot<T> {
  if (slot.codec === codec) return true

  return (
    slot.codec instanceof SchemaCodec &&
    codec instanceof SchemaCodec &&
    slot.codec.schema === codec.schema
  )
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
