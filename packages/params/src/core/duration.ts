import { invalidValue } from "./errors"

/** Duration in milliseconds; sub-millisecond units give fractions. */
export type Milliseconds = number

const MS_PER_UNIT: Readonly<Record<string, number>> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
}

const TERM = /^(\d*\.?\d*)([^\d.]+)/

/**
 * Parses a duration such as "300ms", "-1.5h" or "2h45m".
 *
 * An optional sign is followed by one or more decimal-number-plus-unit terms.
 * Valid units are "ns", "us" (or "µs"), "ms", "s", "m", "h". A bare "0" needs
 * no unit.
 */
export function parseDuration(input: string): Milliseconds {
  let rest = input
  let sign = 1

  if (rest.startsWith("-") || rest.startsWith("+")) {
    if (rest.startsWith("-")) sign = -1
    rest = rest.slice(1)
  }

  if (rest === "0") return 0
  if (rest === "") throw invalidValue(`invalid duration ${JSON.stringify(input)}`, input)

  let total = 0

  while (rest.length > 0) {
    const match = TERM.exec(rest)
    const amount = match?.[1] ?? ""
    const unit = match?.[2] ?? ""

    if (!match || amount === "" || amount === ".") {
      throw invalidValue(`invalid duration ${JSON.stringify(input)}`, input)
    }

    const factor = MS_PER_UNIT[unit]

    if (factor === undefined) {
      throw invalidValue(
        `unknown unit ${JSON.stringify(unit)} in duration ${JSON.stringify(input)}`,
        input,
      )
    }

    total += Number(amount) * factor
    rest = rest.slice(match[0].length)
  }

  return total === 0 ? 0 : sign * total
}

/**
 * Inverse of {@link parseDuration}: "0s", "250ms", "10s", "5m0s", "1h30m0s".
 */
export function formatDuration(ms: Milliseconds): string {
  if (ms === 0) return "0s"

  const sign = ms < 0 ? "-" : ""
  let rest = Math.abs(ms)

  if (rest < 1_000) {
    if (rest >= 1) return `${sign}${trim(rest)}ms`
    if (rest >= 1e-3) return `${sign}${trim(rest * 1e3)}µs`
    return `${sign}${trim(rest * 1e6)}ns`
  }

  const hours = Math.floor(rest / 3_600_000)
  rest -= hours * 3_600_000
  const minutes = Math.floor(rest / 60_000)
  rest -= minutes * 60_000

  let out = ""
  if (hours > 0) out += `${hours}h`
  if (hours > 0 || minutes > 0) out += `${minutes}m`

  return `${sign}${out}${trim(rest / 1_000)}s`
}

function trim(n: number): string {
  return String(Number(n.toFixed(9)))
}
