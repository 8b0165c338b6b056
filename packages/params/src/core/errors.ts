import { BaseError, type ErrorContext } from "@preflight/errors"

/**
 * Operational failures: bad data coming in from a provider or a value that
 * does not parse. These are wrapped into a {@link FatalConfigError} by the
 * resolution pass.
 */
export type ConfigErrorCode = "provider_malformed" | "value_invalid"

export type FatalConfigErrorCode =
  | "param_conflict"
  | "param_required"
  | "param_invalid"
  | "provider_failed"
  | "init_failed"
  | "type_conflict"
  | "type_unknown"
  | "resolution_in_progress"
  | "reset_during_drain"
  | "slot_unresolved"

type ErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

export class ConfigError extends BaseError<ConfigErrorCode> {
  constructor(code: ConfigErrorCode, message: string, options: ErrorOptions = {}) {
    super(message, { code, ...options })
  }
}

/**
 * Startup-time contract violation. Returned (as a rejection) instead of
 * exiting so the embedding application decides how to terminate; see
 * `exitOnFatal`.
 */
export class FatalConfigError extends BaseError<FatalConfigErrorCode> {
  constructor(code: FatalConfigErrorCode, message: string, options: ErrorOptions = {}) {
    super(message, { code, ...options, isOperational: false })
  }
}

export function isFatalConfigError(err: unknown): err is FatalConfigError {
  return err instanceof FatalConfigError
}

export function invalidValue(message: string, raw: string, cause?: unknown): ConfigError {
  return new ConfigError("value_invalid", message, { context: { raw }, cause })
}
