import type { ParamDeclaration } from "../../ports/param"
import type { ParamProvider, ProviderResult } from "../../ports/provider"

/**
 * Runs providers left to right and merges their results. A key from a later
 * provider overwrites the same key from an earlier one, so list them from
 * lowest to highest precedence.
 *
 * The first rejection rejects the whole composite; there is no partial
 * result.
 */
export class CompositeProvider implements ParamProvider {
  readonly name: string

  constructor(private readonly providers: readonly ParamProvider[]) {
    this.name = providers.map((provider) => provider.name).join("+")
  }

  async resolve(params: readonly ParamDeclaration[]): Promise<ProviderResult> {
    const merged: Record<string, string> = {}

    for (const provider of this.providers) {
      Object.assign(merged, await provider.resolve(params))
    }

    return merged
  }
}
