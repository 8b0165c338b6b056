import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { ConfigError } from "../../core/errors"
import { envNameFor } from "../../core/names"
import type { ParamDeclaration } from "../../ports/param"
import type { ParamProvider, ProviderResult } from "../../ports/provider"

/**
 * Options for creating a dotenv provider.
 */
export type DotenvProviderOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: rejects if the file is not found.
   * - `false`: provides nothing if the file is not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  /** Same as {@link EnvProviderOptions.prefix}. */
  prefix?: string
}

/**
 * Reads a .env file and maps its variables onto parameters the way
 * {@link EnvProvider} does. The process environment is not touched.
 */
export class DotenvProvider implements ParamProvider {
  readonly name: string

  constructor(private readonly opts: DotenvProviderOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async resolve(params: readonly ParamDeclaration[]): Promise<ProviderResult> {
    const vars = await this.load()
    const out: Record<string, string> = {}

    for (const param of params) {
      const key = envNameFor(param.name, this.opts.prefix)
      const value = Object.hasOwn(vars, key) ? vars[key] : undefined

      if (value !== undefined) out[param.name] = value
    }

    return out
  }

  private async load(): Promise<Record<string, string>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}

      throw new ConfigError("provider_malformed", `cannot read ${filePath}`, {
        cause: err,
        context: { provider: this.name },
      })
    }

    return parse(content)
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
