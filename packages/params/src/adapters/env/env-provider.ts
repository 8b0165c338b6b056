import { ConfigError } from "../../core/errors"
import { envNameFor } from "../../core/names"
import type { ParamDeclaration } from "../../ports/param"
import type { ParamProvider, ProviderResult } from "../../ports/provider"

export type EnvProviderOptions = {
  /**
   * Prepended to every derived variable name.
   *
   * @example "APP_" makes "listen-addr" read APP_LISTEN_ADDR
   */
  prefix?: string

  /**
   * Either a record (undefined values count as unset) or `KEY=VALUE`
   * entries, the shape of a child process environment.
   *
   * @default process.env
   */
  env?: Readonly<Record<string, string | undefined>> | readonly string[]
}

/**
 * Reads each parameter from the variable named by {@link envNameFor}.
 * Variables that match no declared parameter are ignored.
 */
export class EnvProvider implements ParamProvider {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>> | readonly string[]

  constructor(options: EnvProviderOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async resolve(params: readonly ParamDeclaration[]): Promise<ProviderResult> {
    const env = isEntryList(this.env) ? fromEntries(this.env) : this.env
    const out: Record<string, string> = {}

    for (const param of params) {
      const key = envNameFor(param.name, this.prefix)
      const value = Object.hasOwn(env, key) ? env[key] : undefined

      if (value !== undefined) out[param.name] = value
    }

    return out
  }
}

function isEntryList(
  env: Readonly<Record<string, string | undefined>> | readonly string[],
): env is readonly string[] {
  return Array.isArray(env)
}

function fromEntries(entries: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {}

  for (const entry of entries) {
    const at = entry.indexOf("=")

    if (at === -1) {
      throw new ConfigError("provider_malformed", `malformed environment entry ${JSON.stringify(entry)}`, {
        context: { provider: "env", entry },
      })
    }

    // later entries win, as with a real environment block
    env[entry.slice(0, at)] = entry.slice(at + 1)
  }

  return env
}
