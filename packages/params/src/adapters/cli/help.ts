import { ParamTypes, type ParamDeclaration } from "../../ports/param"

const BUILTIN_FLAGS: readonly ParamDeclaration[] = [
  {
    type: ParamTypes.Bool,
    name: "help",
    default: "",
    usage: "Show this help message and exit",
    required: false,
  },
  {
    type: ParamTypes.Bool,
    name: "version",
    default: "",
    usage: "Print out a build string and exit",
    required: false,
  },
]

/**
 * Help text for `--help`: `prefix`, then every parameter sorted by name, then
 * the built-in help and version flags. Ends with a blank line.
 */
export function formatHelp(params: readonly ParamDeclaration[], prefix: string = ""): string {
  let out = ""

  if (prefix !== "") {
    out += `\n${prefix}`
    if (!prefix.endsWith("\n")) out += "\n"
  }

  out += "\n"

  const sorted = [...params].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  for (const param of [...sorted, ...BUILTIN_FLAGS]) out += formatEntry(param)

  return out
}

function formatEntry(param: ParamDeclaration): string {
  let out = `\t--${param.name}`

  if (param.type === ParamTypes.Bool) out += " (flag)"
  out += "\n"

  if (param.usage !== "") out += `\t\t${param.usage}\n`

  if (param.default !== "") out += `\t\tDefault: ${JSON.stringify(param.default)}\n`
  else if (param.required) out += "\t\t(Required)\n"
  else out += "\t\t(Optional)\n"

  return `${out}\n`
}
