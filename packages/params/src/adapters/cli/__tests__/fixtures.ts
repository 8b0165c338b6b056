import { param } from "../../../ports/__tests__/declarations"
import { type ParamDeclaration, ParamTypes } from "../../../ports/param"

export const cliParams: readonly ParamDeclaration[] = [
  param("foo"),
  param("bar", { usage: "wut" }),
  param("baz", { usage: "wut", default: "wat" }),
  param("flag1", { type: ParamTypes.Bool }),
  param("flag2", { type: ParamTypes.Bool }),
  param("foo-bar"),
]

export class ExitSignal extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`)
  }
}

export function throwingExit(code: number): never {
  throw new ExitSignal(code)
}
