/**
 * Tags of the built-in parameter types. Custom types add their own tags
 * through {@link TypeRegistry.register}.
 */
export const ParamTypes = {
  String: "string",
  Int: "int",
  Int64: "int64",
  Bool: "bool",
  Duration: "duration",
  Json: "json",
} as const

export type BuiltinParamTypeTag = (typeof ParamTypes)[keyof typeof ParamTypes]

/**
 * Everything a provider needs to know about a declared parameter.
 *
 * Declarations are compared field by field, so two call sites may declare the
 * same parameter only if they agree on all of it.
 */
export type ParamDeclaration = Readonly<{
  /** Tag into the {@link TypeRegistry} */
  type: string

  /** e.g. "listen-addr" or "db-pool-size" */
  name: string

  /**
   * Raw string form of the default, parsable by the type. Ignored when
   * `required` is set. For bools this is "true" or "".
   */
  default: string

  usage: string

  required: boolean
}>

/**
 * Handle returned by a declaration. Filled once per resolution pass; reading
 * `value` earlier throws.
 */
export interface ParamSlot<T> {
  readonly name: string
  readonly resolved: boolean
  readonly value: T
}

export function sameDeclaration(a: ParamDeclaration, b: ParamDeclaration): boolean {
  return (
    a.type === b.type &&
    a.name === b.name &&
    a.default === b.default &&
    a.usage === b.usage &&
    a.required === b.required
  )
}
