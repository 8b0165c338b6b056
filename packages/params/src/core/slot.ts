import type { ParamSlot } from "../ports/param"
import { FatalConfigError } from "./errors"

type SlotState<T> = { resolved: false } | { resolved: true; value: T }

/** Turns the resolved raw string into the slot's value. */
export type SlotCodec<T> = {
  parse(raw: string): T
}

/**
 * Registry-side view of a slot. Only the registry holds these; callers get the
 * read-only {@link ParamSlot}.
 */
export class WritableSlot<T> implements ParamSlot<T> {
  private state: SlotState<T> = { resolved: false }

  constructor(
    readonly name: string,
    readonly codec: SlotCodec<T>,
  ) {}

  get resolved(): boolean {
    return this.state.resolved
  }

  get value(): T {
    if (!this.state.resolved) {
      throw new FatalConfigError(
        "slot_unresolved",
        `parameter "${this.name}" read before resolution`,
        { context: { param: this.name } },
      )
    }

    return this.state.value
  }

  /** Decodes `raw` and stores it. Decoding errors propagate untouched. */
  fill(raw: string): void {
    this.state = { resolved: true, value: this.codec.parse(raw) }
  }
}
