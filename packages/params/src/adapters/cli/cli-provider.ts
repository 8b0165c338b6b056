import { type BuildInfo, currentBuildInfo, formatVersion } from "../../core/build-info"
import type { ParamDeclaration } from "../../ports/param"
import type { ParamProvider, ProviderResult } from "../../ports/provider"
import { formatHelp } from "./help"
import { parseArgs } from "./parse-args"

export type CliProviderDeps = {
  /** @default process.argv.slice(2) */
  argv?: readonly string[]

  /** Where help and version text go. @default process.stdout */
  stdout?: { write(text: string): unknown }

  /** Called with 0 after help or version output. @default process.exit */
  exit?: (code: number) => never

  /** Printed above the parameter list in help output. */
  helpPrefix?: string

  /** Shown by `--version`. @default currentBuildInfo() */
  build?: BuildInfo
}

/**
 * Reads parameters from command-line flags. `-h`/`--help` and
 * `-V`/`--version` print and exit instead of resolving.
 */
export class CliProvider implements ParamProvider {
  readonly name = "cli"
  private readonly argv: readonly string[]
  private readonly stdout: { write(text: string): unknown }
  private readonly exit: (code: number) => never
  private readonly helpPrefix: string
  private readonly build: BuildInfo

  constructor(deps: CliProviderDeps = {}) {
    this.argv = deps.argv ?? process.argv.slice(2)
    this.stdout = deps.stdout ?? process.stdout
    this.exit = deps.exit ?? ((code) => process.exit(code))
    this.helpPrefix = deps.helpPrefix ?? ""
    this.build = deps.build ?? currentBuildInfo()
  }

  async resolve(params: readonly ParamDeclaration[]): Promise<ProviderResult> {
    const parsed = parseArgs(this.argv, params)

    switch (parsed.kind) {
      case "values":
        return parsed.values
      case "help":
        this.stdout.write(formatHelp(params, this.helpPrefix))
        return this.exit(0)
      case "version":
        this.stdout.write(formatVersion(this.build))
        return this.exit(0)
    }
  }
}
