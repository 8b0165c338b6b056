import { stringify } from "lossless-json"
import { ParamTypes } from "../../ports/param"
import type { ParamType } from "../../ports/param-type"
import { formatDuration, type Milliseconds, parseDuration } from "../duration"
import { ConfigError, invalidValue } from "../errors"

const INTEGER = /^[+-]?\d+$/

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

/**
 * For types whose structured form is a JSON string: `"30s"` in the file
 * becomes `30s`.
 */
export function structuredString(value: unknown): string {
  if (typeof value !== "string") {
    throw new ConfigError("value_invalid", `expected a JSON string, got ${stringify(value) ?? typeof value}`)
  }

  return value
}

/**
 * For types whose structured form is already their raw form: numbers,
 * booleans, nested objects. Numbers decoded as `LosslessNumber` keep their
 * literal text, so `9007199254740993` and `1.0` come out as written.
 */
export function structuredAsIs(value: unknown): string {
  const raw = stringify(value)

  if (raw === undefined) {
    throw new ConfigError("value_invalid", `expected a JSON value, got ${typeof value}`)
  }

  return raw
}

export const stringType: ParamType<string> = {
  tag: ParamTypes.String,
  parse: (raw) => raw,
  format: (value) => value,
  fromStructured: structuredString,
}

export const intType: ParamType<number> = {
  tag: ParamTypes.Int,
  parse: (raw) => {
    if (!INTEGER.test(raw)) throw invalidValue(`invalid integer ${JSON.stringify(raw)}`, raw)

    const value = Number(raw)

    if (value < INT32_MIN || value > INT32_MAX) {
      throw invalidValue(`integer ${raw} out of 32-bit range`, raw)
    }

    return value === 0 ? 0 : value
  },
  format: (value) => String(value),
  fromStructured: structuredAsIs,
}

export const int64Type: ParamType<bigint> = {
  tag: ParamTypes.Int64,
  parse: (raw) => {
    if (!INTEGER.test(raw)) throw invalidValue(`invalid integer ${JSON.stringify(raw)}`, raw)

    const value = BigInt(raw)

    if (value < INT64_MIN || value > INT64_MAX) {
      throw invalidValue(`integer ${raw} out of 64-bit range`, raw)
    }

    return value
  },
  format: (value) => value.toString(),
  fromStructured: structuredAsIs,
}

export const boolType: ParamType<boolean> = {
  tag: ParamTypes.Bool,
  parse: (raw) => raw === "true",
  format: (value) => (value ? "true" : ""),
  fromStructured: structuredAsIs,
}

export const durationType: ParamType<Milliseconds> = {
  tag: ParamTypes.Duration,
  parse: parseDuration,
  format: formatDuration,
  fromStructured: structuredString,
}

export const jsonType: ParamType<unknown> = {
  tag: ParamTypes.Json,
  parse: (raw) => {
    try {
      return JSON.parse(raw)
    } catch (err) {
      throw invalidValue("invalid JSON payload", raw, err)
    }
  },
  format: (value) => JSON.stringify(value),
  fromStructured: structuredAsIs,
}

export const builtinTypes: readonly ParamType<unknown>[] = [
  stringType,
  intType,
  int64Type,
  boolType,
  durationType,
  jsonType,
]
