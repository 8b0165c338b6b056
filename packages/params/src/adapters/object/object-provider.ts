import type { ParamDeclaration } from "../../ports/param"
import type { ParamProvider, ProviderResult } from "../../ports/provider"

/**
 * Fixed values, returned regardless of what is declared. Mostly for tests
 * and for overrides layered last in a {@link CompositeProvider}.
 */
export class ObjectProvider implements ParamProvider {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, string>>,
    name: string = "object",
  ) {
    this.name = name
  }

  async resolve(_params: readonly ParamDeclaration[]): Promise<ProviderResult> {
    return { ...this.values }
  }
}
