function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain and return every value encountered, outermost first.
 * Stops at `maxDepth` entries or on the first repeated object.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Flattens a cause chain into one line: `outer: middle: root`.
 *
 * @example
 * ```ts
 * describeChain(new Error("loading config", { cause: new Error("ENOENT") }))
 * // "loading config: ENOENT"
 * ```
 */
export function describeChain(err: unknown): string {
  return errorChain(err)
    .map((e) => (e instanceof Error ? e.message : String(e)))
    .filter((m) => m.length > 0)
    .join(": ")
}
