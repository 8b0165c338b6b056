import { describeChain } from "@preflight/errors"
import type { Logger } from "@preflight/logger"

export type ExitOnFatalDeps = {
  logger: Logger
  /** @default process.exit */
  exit?: (code: number) => never
}

/**
 * Logs `err` with its cause chain at fatal and exits with status 1. The
 * library itself never exits; call this from `main` when `configure` or
 * `parse` rejects.
 */
export function exitOnFatal(err: unknown, deps: ExitOnFatalDeps): never {
  const exit = deps.exit ?? ((code: number) => process.exit(code))

  deps.logger.fatal(`Configuration failed: ${describeChain(err)}`, { err })

  return exit(1)
}
