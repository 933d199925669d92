import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import type { EventService } from "./EventService.js"
import { EventValidator } from "./EventValidator.js"
import { Signature, type NostrEvent } from "../core/Schema.js"
import { makeNote, testServices } from "../testing/fixtures.js"

const run = <A, E>(effect: Effect.Effect<A, E, EventValidator | EventService>) =>
  Effect.runPromise(Effect.provide(effect, testServices()))

const validate = (event: NostrEvent) => Effect.flatMap(EventValidator, (validator) => validator.validate(event))

const rejection = (event: NostrEvent) =>
  validate(event).pipe(
    Effect.flip,
    Effect.map((error) => error._tag)
  )

const flipLastHex = (hex: string): string => hex.slice(0, -1) + (hex.endsWith("0") ? "1" : "0")

describe("EventValidator", () => {
  test("accepts a correctly signed event", async () => {
    const [note, validated] = await run(
      Effect.gen(function* () {
        const note = yield* makeNote("valid")
        return [note, yield* validate(note)] as const
      })
    )
    expect(validated).toEqual(note)
  })

  test("validation is repeatable", async () => {
    const results = await run(
      Effect.gen(function* () {
        const note = yield* makeNote("twice")
        const first = yield* Effect.either(validate(note))
        const second = yield* Effect.either(validate(note))
        return [first._tag, second._tag]
      })
    )
    expect(results).toEqual(["Right", "Right"])
  })

  test("changed content fails IdMismatch", async () => {
    const tag = await run(
      Effect.flatMap(makeNote("original"), (note) => rejection({ ...note, content: "originaL" }))
    )
    expect(tag).toBe("IdMismatch")
  })

  test("changed signature fails BadSignature", async () => {
    const tag = await run(
      Effect.flatMap(makeNote("signed"), (note) => rejection({ ...note, sig: Signature.make(flipLastHex(note.sig)) }))
    )
    expect(tag).toBe("BadSignature")
  })

  test("IdMismatch is checked before the signature", async () => {
    const tag = await run(
      Effect.flatMap(makeNote("both"), (note) =>
        rejection({ ...note, content: "changed", sig: Signature.make(flipLastHex(note.sig)) })
      )
    )
    expect(tag).toBe("IdMismatch")
  })

  test("events too far in the future fail FutureTimestamp", async () => {
    const now = Math.floor(Date.now() / 1000)
    const error = await run(
      Effect.flatMap(makeNote("later", { created_at: now + 3600 }), (note) => Effect.flip(validate(note)))
    )
    expect(error._tag).toBe("FutureTimestamp")
  })

  test("events within the skew tolerance pass", async () => {
    const now = Math.floor(Date.now() / 1000)
    const result = await run(
      Effect.flatMap(makeNote("soon", { created_at: now + 60 }), (note) => Effect.either(validate(note)))
    )
    expect(result._tag).toBe("Right")
  })
})
