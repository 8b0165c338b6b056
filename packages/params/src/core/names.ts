/**
 * Joins the non-empty parts with "-", for namespacing parameter names.
 *
 * @example
 * ```ts
 * prefixed("db", "", "pool-size") // "db-pool-size"
 * ```
 */
export function prefixed(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join("-")
}

/**
 * Environment variable a parameter is read from: "db-pool-size" with prefix
 * "APP_" becomes "APP_DB_POOL_SIZE".
 */
export function envNameFor(name: string, prefix: string = ""): string {
  return prefix + name.toUpperCase().replaceAll("-", "_")
}
