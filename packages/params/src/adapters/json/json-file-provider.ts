import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "lossless-json"
import { z } from "zod"
import { ConfigError } from "../../core/errors"
import type { TypeRegistry } from "../../core/type-registry"
import { type ParamDeclaration, ParamTypes } from "../../ports/param"
import type { ParamProvider, ProviderResult } from "../../ports/provider"

const DocumentSchema = z.record(z.string(), z.unknown())

export type JsonFileProviderOptions = {
  /** Converts structured values back to raw strings per parameter type. */
  types: TypeRegistry

  /**
   * Parameter that names the file, offered to the inner provider.
   *
   * @default "config-json-file"
   */
  paramName?: string

  /**
   * Base directory for resolving a relative file path.
   *
   * @default process.cwd()
   */
  cwd?: string

  /** @default fs.readFile as utf-8 */
  readFile?: (filePath: string) => Promise<string>
}

/**
 * Wraps another provider and adds a JSON object file as a lower-precedence
 * layer.
 *
 * The inner provider also resolves a synthetic string parameter (by default
 * `config-json-file`) naming the file, so the path itself can come from the
 * environment or the command line. Keys in the file are matched against
 * lower-cased parameter names; `null` counts as absent. Whatever the inner
 * provider returns wins over the file.
 *
 * Numbers are decoded without going through a float, so an `int64` above
 * 2^53 reaches its parser digit for digit.
 *
 * @example
 * ```json
 * { "listen-addr": ":8080", "timeout": "30s", "tags": ["a", "b"] }
 * ```
 */
export class JsonFileProvider implements ParamProvider {
  readonly name: string
  private readonly paramName: string
  private readonly cwd: string
  private readonly readFile: (filePath: string) => Promise<string>

  constructor(
    private readonly inner: ParamProvider,
    private readonly opts: JsonFileProviderOptions,
  ) {
    this.name = `json-file(${inner.name})`
    this.paramName = opts.paramName ?? "config-json-file"
    this.cwd = opts.cwd ?? process.cwd()
    this.readFile = opts.readFile ?? ((filePath) => fs.readFile(filePath, "utf-8"))
  }

  async resolve(params: readonly ParamDeclaration[]): Promise<ProviderResult> {
    const withFile: ParamDeclaration[] = [
      ...params,
      {
        type: ParamTypes.String,
        name: this.paramName,
        default: "",
        usage: "Name of json file to parse config object out of. Environment and CLI params overwrite json ones",
        required: false,
      },
    ]

    const found = await this.inner.resolve(withFile)
    const file = Object.hasOwn(found, this.paramName) ? found[this.paramName] : undefined

    if (file === undefined || file === "") return found

    const document = await this.load(file)
    const out: Record<string, string> = {}

    for (const param of withFile) {
      const key = param.name.toLowerCase()
      const value = Object.hasOwn(document, key) ? document[key] : undefined

      if (value === undefined || value === null) continue

      out[param.name] = this.convert(param, value, file)
    }

    return { ...out, ...found }
  }

  private async load(file: string): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.cwd, file)

    let content: string

    try {
      content = await this.readFile(filePath)
    } catch (err) {
      throw this.malformed(`cannot read config file ${filePath}`, file, err)
    }

    let decoded: unknown

    try {
      decoded = parse(content)
    } catch (err) {
      throw this.malformed(`config file ${filePath} is not valid JSON`, file, err)
    }

    const result = DocumentSchema.safeParse(decoded)

    if (!result.success) {
      throw this.malformed(
        `config file ${filePath} must hold a JSON object:\n${z.prettifyError(result.error)}`,
        file,
        result.error,
      )
    }

    return result.data
  }

  private convert(param: ParamDeclaration, value: unknown, file: string): string {
    try {
      return this.opts.types.get(param.type).fromStructured(value)
    } catch (err) {
      throw new ConfigError(
        "provider_malformed",
        `config file ${file}: bad value for ${param.name}`,
        { cause: err, context: { provider: this.name, param: param.name } },
      )
    }
  }

  private malformed(message: string, file: string, cause: unknown): ConfigError {
    return new ConfigError("provider_malformed", message, {
      cause,
      context: { provider: this.name, file },
    })
  }
}
