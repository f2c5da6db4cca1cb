import { describe, expectTypeOf } from "vitest"
import { it, expect } from "@effect/vitest"
import { Cause, Effect, Either, Exit } from "effect"
import * as Keel from "../src/index.js"

type WriterScope = Keel.Scope.ScopeBrand<"Writer">

interface Writer<E> extends Keel.Handle.Handle<E> {
  readonly tell: (line: string) => Keel.Eff.Eff<void, E>
}

const runWriter = <A, R>(body: (writer: Writer<WriterScope>) => Keel.Eff.Eff<A, R>, onRelease: () => void) =>
  Effect.suspend(() => {
    const lines: Array<string> = []
    return Keel.Handler.run<WriterScope, A, ReadonlyArray<string>, R>({
      label: "Writer",
      use: (scope) =>
        body({
          scope,
          tell: (line) =>
            Keel.Scope.guard(
              scope,
              Effect.sync(() => {
                lines.push(line)
              }),
            ),
        }),
      finalize: () => lines,
      release: Effect.sync(onRelease),
    })
  })

describe("Scope", () => {
  it.effect("current lists only the handlers still running", () =>
    Effect.gen(function* () {
      expect(yield* Keel.Scope.current).toEqual([])
      const inside = yield* Keel.State.evalState(0, () =>
        Keel.Jump.withJump(() => Effect.void).pipe(Effect.zipRight(Keel.Scope.current)),
      )
      expect(inside.map((scope) => scope.label)).toEqual(["State"])
    }),
  )

  it.effect("nested frames get consecutive generations", () =>
    Effect.gen(function* () {
      const scopes = yield* Keel.State.evalState("outer", () =>
        Keel.EarlyReturn.withEarlyReturn(() => Keel.Scope.current),
      )
      expect(scopes.map((scope) => scope.label)).toEqual(["State", "EarlyReturn"])
      expect(scopes[1].generation).toBe(scopes[0].generation + 1)
    }),
  )

  it.effect("a handle is usable only inside its handler", () =>
    Effect.gen(function* () {
      const leaked = yield* Keel.State.evalState(0, (state) =>
        Effect.gen(function* () {
          expect(yield* Keel.Handle.isUsable(state)).toBe(true)
          return state
        }),
      )
      expect(yield* Keel.Handle.isUsable(leaked)).toBe(false)
      expect(leaked.scope.status).toBe("closed")
      expect(leaked.scope.key).toBe(`keel/Scope/State#${leaked.scope.generation}`)
    }),
  )

  it.effect("a violation is recorded before the computation dies", () =>
    Effect.gen(function* () {
      const memory = Keel.Debug.makeMemorySink()
      const leaked = yield* Keel.State.evalState(0, (state) => Effect.succeed(state))
      const exit = yield* Effect.exit(
        Keel.State.evalState(1, () => Keel.State.get(leaked)).pipe(Keel.Debug.withSinks([memory.sink])),
      )
      expect(Exit.isFailure(exit) && Cause.isDie(exit.cause)).toBe(true)
      expect(memory.events()).toEqual([
        {
          type: "scope:violation",
          scope: { generation: leaked.scope.generation, label: "State" },
          reason: "closed",
          openScopes: [{ generation: leaked.scope.generation + 1, label: "State" }],
        },
      ])
    }),
  )

  it("operations on a handle require its scope in the type", () => {
    const leaked = Keel.Runtime.runPure(Keel.State.evalState(0, (state) => Effect.succeed(state)))
    const program = Keel.State.get(leaked)
    expectTypeOf<Effect.Effect.Context<typeof program>>().toEqualTypeOf<Keel.State.StateScope>()
    const handled = Keel.State.evalState(1, () => program)
    expectTypeOf<Effect.Effect.Context<typeof handled>>().toEqualTypeOf<never>()
  })
})

describe("Handler.run", () => {
  it("returns the body result with the finalized storage and releases once", () => {
    let released = 0
    const result = Keel.Runtime.runPure(
      runWriter(
        (writer) =>
          Effect.gen(function* () {
            yield* writer.tell("a")
            yield* writer.tell("b")
            return 2
          }),
        () => {
          released++
        },
      ),
    )
    expect(result).toEqual([2, ["a", "b"]])
    expect(released).toBe(1)
  })

  it("releases when the body unwinds", () => {
    let released = 0
    const result = Keel.Runtime.runPure(
      Keel.Exception.try((ex: Keel.Exception.ExceptionHandle<string>) =>
        runWriter(
          (writer) => Effect.zipRight(writer.tell("partial"), Keel.Exception.throw(ex, "stop")),
          () => {
            released++
          },
        ),
      ),
    )
    expect(result).toEqual(Either.left("stop"))
    expect(released).toBe(1)
  })
})
