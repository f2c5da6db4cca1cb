import type { Eff } from "./internal/runtime/core/scope.js"

/**
 * Compound:
 * - Two handles travelling as one value. It owns no scope of its own: using
 *   it needs exactly the scopes of its members.
 * - Larger capabilities are usually plain interfaces whose operations close
 *   over handles; bundles are for passing several handles through one parameter.
 */
export interface Compound<out H1, out H2> {
  readonly first: H1
  readonly second: H2
}

export const make = <H1, H2>(first: H1, second: H2): Compound<H1, H2> => ({ first, second })

export const withCompound = <H1, H2, A, R>(
  compound: Compound<H1, H2>,
  body: (first: H1, second: H2) => Eff<A, R>,
): Eff<A, R> => body(compound.first, compound.second)

export const runCompound = <H1, H2, A, R>(
  first: H1,
  second: H2,
  body: (compound: Compound<H1, H2>) => Eff<A, R>,
): Eff<A, R> => body(make(first, second))
