import {
  type Logger,
  type LoggerOptions,
  type LogLevelName,
  logLevelNames,
  PinoLogger,
} from "@preflight/logger"
import { z } from "zod"
import { CliProvider, type CliProviderDeps } from "../adapters/cli/cli-provider"
import { CompositeProvider } from "../adapters/composite/composite-provider"
import { EnvProvider, type EnvProviderOptions } from "../adapters/env/env-provider"
import {
  JsonFileProvider,
  type JsonFileProviderOptions,
} from "../adapters/json/json-file-provider"
import { ConfigError, FatalConfigError } from "./errors"
import type { ParamRegistry, ResolutionReport } from "./param-registry"

const LogLevelSchema = z.enum(logLevelNames)

export type ConfigureOptions = {
  env?: EnvProviderOptions
  cli?: CliProviderDeps
  json?: Omit<JsonFileProviderOptions, "types">

  /** Render log lines for humans instead of as JSON. */
  prettify?: boolean

  /** @default options => new PinoLogger({}, options) */
  createLogger?: (options: LoggerOptions) => Logger
}

export type ConfigureResult = {
  report: ResolutionReport
  /** Built at the configured `log-level` */
  logger: Logger
}

/**
 * The usual entry point: declares `log-level`, resolves every declared
 * parameter from a JSON file, the environment and the command line (lowest
 * to highest precedence), runs the init callbacks, and hands back a logger
 * built at the resolved level.
 *
 * Expects a registry that has not resolved yet, or one that was reset.
 *
 * @example
 * ```ts
 * const registry = new ParamRegistry()
 * const addr = registry.string("listen-addr", ":8080", "Address to listen on")
 *
 * try {
 *   const { logger } = await configure(registry)
 *   logger.info("Listening", { addr: addr.value })
 * } catch (err) {
 *   exitOnFatal(err, { logger: new PinoLogger() })
 * }
 * ```
 */
export async function configure(
  registry: ParamRegistry,
  options: ConfigureOptions = {},
): Promise<ConfigureResult> {
  const createLogger = options.createLogger ?? ((opts: LoggerOptions) => new PinoLogger({}, opts))
  const levelSlot = registry.string(
    "log-level",
    "info",
    `Minimum level to log at. One of: ${logLevelNames.join(", ")}`,
  )

  const built: { logger?: Logger } = {}

  await registry.onInit(() => {
    built.logger = createLogger({ level: parseLevel(levelSlot.value), prettify: options.prettify })
  })

  const provider = new JsonFileProvider(
    new CompositeProvider([new EnvProvider(options.env), new CliProvider(options.cli)]),
    { ...options.json, types: registry.types },
  )

  const report = await registry.parse(provider)

  if (!built.logger) {
    throw new FatalConfigError("init_failed", "log-level init callback did not run", {
      context: { param: "log-level" },
    })
  }

  return { report, logger: built.logger }
}

function parseLevel(raw: string): LogLevelName {
  const result = LogLevelSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigError(
      "value_invalid",
      `invalid log-level ${JSON.stringify(raw)}: ${z.prettifyError(result.error)}`,
      { context: { param: "log-level", raw } },
    )
  }

  return result.data
}
