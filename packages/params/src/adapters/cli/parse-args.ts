import { ParamTypes, type ParamDeclaration } from "../../ports/param"

export type ParsedArgs =
  | { kind: "values"; values: Record<string, string> }
  | { kind: "help" }
  | { kind: "version" }

const HELP_FLAGS = new Set(["-h", "--help"])
const VERSION_FLAGS = new Set(["-V", "--version"])

/**
 * Scans `args` for `--name` flags of declared parameters.
 *
 * - `--name=value` or `--name value`; a non-bool without `=` takes the next
 *   token whatever it looks like, or "" at the end
 * - a bool takes the next token only when it does not start with "-";
 *   otherwise presence means "true", or "" when the default is already "true"
 * - anything else is skipped
 *
 * Scanning stops at the first help or version flag. A flag consumed as
 * another flag's value does not count.
 */
export function parseArgs(args: readonly string[], params: readonly ParamDeclaration[]): ParsedArgs {
  const byFlag = new Map(params.map((param) => [`--${param.name}`, param]))
  const values: Record<string, string> = {}

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ""
    const eq = arg.indexOf("=")
    const flag = eq === -1 ? arg : arg.slice(0, eq)

    if (HELP_FLAGS.has(flag)) return { kind: "help" }
    if (VERSION_FLAGS.has(flag)) return { kind: "version" }

    const param = byFlag.get(flag)

    if (!param) continue

    let value = eq === -1 ? undefined : arg.slice(eq + 1)
    const next = args[i + 1]

    if (param.type === ParamTypes.Bool) {
      if (value === undefined && next !== undefined && !next.startsWith("-")) {
        value = next
        i++
      }

      values[param.name] = value ?? (param.default === "true" ? "" : "true")
      continue
    }

    if (value === undefined && next !== undefined) {
      value = next
      i++
    }

    values[param.name] = value ?? ""
  }

  return { kind: "values", values }
}
