import type { ParamDeclaration } from "./param"

/**
 * Raw values keyed by parameter name. A missing key means "not provided";
 * an empty string is a provided value.
 */
export type ProviderResult = Readonly<Record<string, string>>

/**
 * A place parameter values come from: the command line, the environment,
 * a file.
 *
 * Providers only find raw strings. Defaults, required checks and type
 * conversion happen in the registry.
 */
export interface ParamProvider {
  /**
   * Human-readable name for logs and errors.
   * Example: "env", "cli", "json-file(env+cli)"
   */
  readonly name: string

  /**
   * Look up values for the declared parameters.
   *
   * Must not mutate `params`. Rejects on malformed input; a bool value
   * counts as true only when it is exactly "true".
   */
  resolve(params: readonly ParamDeclaration[]): Promise<ProviderResult>
}
