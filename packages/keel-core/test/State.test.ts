import { describe } from "vitest"
import { it, expect } from "@effect/vitest"
import { Effect } from "effect"
import * as Keel from "../src/index.js"

const thrown = (run: () => unknown): unknown => {
  try {
    run()
  } catch (error) {
    return error
  }
  return undefined
}

const double = <E>(state: Keel.State.State<number, E>) => Keel.State.modify(state, (n) => n * 2)

describe("State", () => {
  it("runState returns the body result and the final value", () => {
    const result = Keel.Runtime.runPure(
      Keel.State.runState(1, (state) =>
        Effect.gen(function* () {
          yield* Keel.State.modify(state, (n) => n * 3)
          return "done"
        }),
      ),
    )
    expect(result).toEqual(["done", 3])
  })

  it("set overwrites and get reads back", () => {
    const result = Keel.Runtime.runPure(
      Keel.State.evalState("initial", (state) =>
        Effect.gen(function* () {
          const before = yield* Keel.State.get(state)
          yield* Keel.State.set(state, "replaced")
          return `${before} -> ${yield* Keel.State.get(state)}`
        }),
      ),
    )
    expect(result).toBe("initial -> replaced")
  })

  it("focus gives a state handle over one field", () => {
    const result = Keel.Runtime.runPure(
      Keel.State.runState({ hits: 1, misses: 2 }, (stats) => {
        const hits = Keel.State.focus(stats, {
          get: (whole) => whole.hits,
          set: (whole, part: number) => ({ ...whole, hits: part }),
        })
        return Effect.zipRight(Keel.State.modify(hits, (n) => n + 10), double(hits))
      }),
    )
    expect(result).toEqual([undefined, { hits: 22, misses: 2 }])
  })

  it("a handle returned from its handler cannot be used afterwards", () => {
    const leaked = Keel.Runtime.runPure(Keel.State.evalState(0, (state) => Effect.succeed(state)))
    const error = thrown(() =>
      Keel.Runtime.runPure(
        Keel.State.evalState(1, () => Keel.State.get(leaked)),
        { sinks: [] },
      ),
    )
    expect(error).toBeInstanceOf(Keel.Errors.ScopeViolationError)
    expect(error).toMatchObject({
      _tag: "ScopeViolation",
      reason: "closed",
      scope: { label: "State", generation: leaked.scope.generation },
    })
  })
})
