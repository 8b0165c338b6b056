import { type Logger, NullLogger } from "@preflight/logger"
import { FatalConfigError } from "./errors"

export type InitCallback = () => void | Promise<void>

/**
 * - `accepting`: callbacks queue up, nothing has run
 * - `draining`: callbacks run one by one; new ones (even from inside a
 *   running callback) join the tail of the same drain
 * - `closed`: the drain finished; new callbacks run inline at registration
 */
export type SchedulerState = "accepting" | "draining" | "closed"

export type InitSchedulerDeps = {
  logger?: Logger
}

/**
 * Decouples declaring init work from running it. Callbacks registered before
 * parameters are resolved wait in FIFO order; {@link drain} runs them once
 * values are available.
 *
 * Callbacks never overlap: each one is awaited before the next starts. There
 * is no timeout, so a callback that never settles stalls the drain.
 */
export class InitScheduler {
  private queue: InitCallback[] = []
  private current: SchedulerState = "accepting"
  private readonly logger: Logger

  constructor(deps: InitSchedulerDeps = {}) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "init-scheduler" })
  }

  get state(): SchedulerState {
    return this.current
  }

  get pending(): number {
    return this.queue.length
  }

  /**
   * Queues `callback`, or runs it right away once the scheduler is closed.
   *
   * The returned promise settles once the callback has been handed over: at
   * once when queued, after it finishes when run inline. A sync callback run
   * inline has already returned by the time `register` does.
   */
  register(callback: InitCallback): Promise<void> {
    if (this.current !== "closed") {
      this.queue.push(callback)
      return Promise.resolve()
    }

    let result: void | Promise<void>

    try {
      result = callback()
    } catch (err) {
      return Promise.reject(initFailed(err))
    }

    return Promise.resolve(result).catch((err: unknown) => {
      throw initFailed(err)
    })
  }

  /**
   * Runs queued callbacks until the queue is empty, then closes.
   *
   * On the first failure the remaining callbacks are dropped, the scheduler
   * closes and the error propagates.
   *
   * @returns How many callbacks ran.
   */
  async drain(): Promise<number> {
    if (this.current === "closed") return 0

    if (this.current === "draining") {
      throw new FatalConfigError("resolution_in_progress", "init callbacks are already draining")
    }

    this.current = "draining"

    let ran = 0

    try {
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        ran++
        this.logger.trace("Running init callback", { position: ran, pending: this.queue.length })

        try {
          await next()
        } catch (err) {
          throw initFailed(err, ran)
        }
      }
    } finally {
      this.queue = []
      this.current = "closed"
    }

    this.logger.debug("Init callbacks drained", { count: ran })

    return ran
  }

  /**
   * Back to `accepting` with an empty queue, for repeated declare/resolve
   * cycles in one process (test cases). Not allowed mid-drain.
   */
  reset(): void {
    if (this.current === "draining") {
      throw new FatalConfigError("reset_during_drain", "cannot reset while init callbacks are draining")
    }

    this.queue = []
    this.current = "accepting"
  }
}

function initFailed(cause: unknown, position?: number): FatalConfigError {
  const where = position === undefined ? "inline" : `#${position}`

  return new FatalConfigError("init_failed", `init callback ${where} failed`, {
    cause,
    context: position === undefined ? {} : { position },
  })
}
