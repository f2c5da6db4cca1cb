import { describe } from "vitest"
import { it, expect } from "@effect/vitest"
import { Effect, Either } from "effect"
import * as Keel from "../src/index.js"

const incrementReadLine = <E1, E2, E3>(
  total: Keel.State.State<number, E1>,
  exception: Keel.Exception.Exception<string, E2>,
  io: Keel.IO.IOE<E3>,
  readLine: () => string,
) =>
  Keel.Jump.withJump((done) =>
    Effect.forever(
      Effect.gen(function* () {
        const line = yield* Keel.IO.effIO(io, readLine)
        const value = Number.parseInt(line, 10)
        if (Number.isNaN(value)) {
          return yield* Keel.Exception.throw(exception, `Couldn't read: ${line}`)
        }
        if (value === 0) {
          return yield* Keel.Jump.jumpTo(done)
        }
        yield* Keel.State.modify(total, (n) => n + value)
      }),
    ),
  )

const sumLines = (lines: Array<string>) =>
  Keel.Runtime.runEff((io) =>
    Keel.Exception.try((ex: Keel.Exception.ExceptionHandle<string>) =>
      Keel.State.runState(0, (total) => incrementReadLine(total, ex, io, () => lines.shift() ?? "")),
    ),
  )

describe("Runtime.runEff", () => {
  it("runs synchronous and asynchronous host actions", async () => {
    const result = await Keel.Runtime.runEff((io) =>
      Effect.gen(function* () {
        const a = yield* Keel.IO.effIO(io, () => 20)
        const b = yield* Keel.IO.effPromise(io, () => Promise.resolve(22))
        return a + b
      }),
    )
    expect(result).toBe(42)
  })

  it("combines state, exceptions, jumps and I/O", async () => {
    const lines = ["3", "4", "0", "99"]
    expect(await sumLines(lines)).toEqual(Either.right([undefined, 7]))
    expect(lines).toEqual(["99"])
  })

  it("reports unreadable input through the exception handle", async () => {
    expect(await sumLines(["3", "x", "5"])).toEqual(Either.left("Couldn't read: x"))
  })

  it("rejects with the error of a failed host action", async () => {
    await expect(
      Keel.Runtime.runEff((io) => Keel.IO.effPromise(io, () => Promise.reject(new Error("disk unavailable")))),
    ).rejects.toThrow("disk unavailable")
  })

  it("an IO handle does not outlive its run", async () => {
    const leaked = await Keel.Runtime.runEff((io) => Effect.succeed(io))
    const memory = Keel.Debug.makeMemorySink()
    await expect(
      Keel.Runtime.runEff(() => Keel.IO.effIO(leaked, () => "late"), {
        sinks: [memory.sink],
        config: { traceScopes: false, label: "second-run" },
      }),
    ).rejects.toBeInstanceOf(Keel.Errors.ScopeViolationError)
    expect(memory.events()).toEqual([
      {
        type: "scope:violation",
        scope: { generation: leaked.scope.generation, label: "IO" },
        reason: "closed",
        openScopes: [{ generation: leaked.scope.generation + 1, label: "IO" }],
        runtimeLabel: "second-run",
      },
    ])
  })
})

describe("Runtime.runPure", () => {
  it("rethrows defects unchanged", () => {
    const boom = new Error("boom")
    expect(() => Keel.Runtime.runPure(Effect.die(boom))).toThrow(boom)
  })

  it("records scope traffic when tracing is on", () => {
    const memory = Keel.Debug.makeMemorySink()
    Keel.Runtime.runPure(
      Keel.State.evalState(0, (state) => Keel.State.get(state)),
      { sinks: [memory.sink], config: { traceScopes: true, label: "traced" } },
    )
    const events = memory.events()
    expect(events.map((event) => event.type)).toEqual(["scope:open", "scope:close"])
    expect(events.map((event) => event.runtimeLabel)).toEqual(["traced", "traced"])
    expect(events[0]).toMatchObject({ type: "scope:open", depth: 0, scope: { label: "State" } })
  })
})
