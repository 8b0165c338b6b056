/**
 * Conversions for one parameter type, between the flat string form every
 * provider speaks and the typed value a slot holds.
 *
 * @typeParam T - Value stored in slots of this type.
 */
export interface ParamType<T> {
  readonly tag: string

  /**
   * Raw string to typed value. Throws a `ConfigError` with code
   * `value_invalid` when the input is malformed.
   */
  parse(raw: string): T

  /** Typed value to raw string, used for defaults and help output. */
  format(value: T): string

  /**
   * Decoded structured-document value to raw string. A JSON string "foo"
   * arrives here as `"foo"` and must come out unquoted, while `10` or `true`
   * come out as written.
   */
  fromStructured(value: unknown): string
}
