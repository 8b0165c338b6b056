import type { ParamType } from "../ports/param-type"
import { FatalConfigError } from "./errors"
import { builtinTypes } from "./types/builtin-types"

/**
 * Tag → {@link ParamType}. One per {@link ParamRegistry}; providers that need
 * to convert structured values (the JSON file provider) are handed the same
 * instance.
 */
export class TypeRegistry {
  private readonly types = new Map<string, ParamType<unknown>>()

  constructor(types: readonly ParamType<unknown>[] = []) {
    for (const type of types) this.register(type)
  }

  /**
   * Adds a type. Tags are never replaced, so a built-in cannot be shadowed.
   */
  register<T>(type: ParamType<T>): ParamType<T> {
    if (this.types.has(type.tag)) {
      throw new FatalConfigError("type_conflict", `param type already defined: ${type.tag}`, {
        context: { type: type.tag },
      })
    }

    this.types.set(type.tag, type)

    return type
  }

  get(tag: string): ParamType<unknown> {
    const type = this.types.get(tag)

    if (!type) {
      throw new FatalConfigError("type_unknown", `param type not defined: ${tag}`, {
        context: { type: tag },
      })
    }

    return type
  }

  has(tag: string): boolean {
    return this.types.has(tag)
  }

  /** True only for the exact instance registered under the tag. */
  owns(type: ParamType<unknown>): boolean {
    return this.types.get(type.tag) === type
  }

  tags(): string[] {
    return [...this.types.keys()]
  }
}

export function createTypeRegistry(custom: readonly ParamType<unknown>[] = []): TypeRegistry {
  return new TypeRegistry([...builtinTypes, ...custom])
}
