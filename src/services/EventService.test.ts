import { describe, expect, test } from "vitest"
import { Effect, Layer } from "effect"
import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex } from "@noble/hashes/utils"
import { EventService, EventServiceLive, serializeEvent } from "./EventService.js"
import { CryptoService, CryptoServiceLive } from "./CryptoService.js"
import { PublicKey } from "../core/Schema.js"
import { BASE_TIME, TEST_KEY } from "../testing/fixtures.js"

const TestLayer = Layer.merge(CryptoServiceLive, EventServiceLive.pipe(Layer.provide(CryptoServiceLive)))

const runWithServices = <A, E>(effect: Effect.Effect<A, E, EventService | CryptoService>): Promise<A> =>
  Effect.runPromise(Effect.provide(effect, TestLayer))

describe("EventService", () => {
  test("serializes as [0, pubkey, created_at, kind, tags, content]", () => {
    const serialized = serializeEvent({
      pubkey: PublicKey.make("b".repeat(64)),
      created_at: 1,
      kind: 1,
      tags: [["t", "x"]],
      content: 'say "hi"\n',
    })
    expect(serialized).toBe(`[0,"${"b".repeat(64)}",1,1,[["t","x"]],"say \\"hi\\"\\n"]`)
  })

  test("creates a signed event whose id is the hash of its serialization", async () => {
    const { event, publicKey, verified } = await runWithServices(
      Effect.gen(function* () {
        const crypto = yield* CryptoService
        const events = yield* EventService
        const event = yield* events.createEvent(
          { kind: 1, content: "Hello Nostr!", tags: [["t", "nostr"]], created_at: BASE_TIME },
          TEST_KEY
        )
        return {
          event,
          publicKey: yield* crypto.getPublicKey(TEST_KEY),
          verified: yield* crypto.verify(event.sig, event.id, event.pubkey),
        }
      })
    )

    expect(event.pubkey).toBe(publicKey)
    expect(event.created_at).toBe(BASE_TIME)
    expect(event.tags).toEqual([["t", "nostr"]])
    expect(event.id).toBe(bytesToHex(sha256(new TextEncoder().encode(serializeEvent(event)))))
    expect(verified).toBe(true)
  })

  test("ids are deterministic", async () => {
    const [first, second] = await runWithServices(
      Effect.flatMap(EventService, (events) =>
        Effect.all([
          events.createEvent({ kind: 1, content: "same", created_at: BASE_TIME }, TEST_KEY),
          events.createEvent({ kind: 1, content: "same", created_at: BASE_TIME }, TEST_KEY),
        ])
      )
    )
    expect(first.id).toBe(second.id)
  })

  test("defaults created_at to the current time", async () => {
    const before = Math.floor(Date.now() / 1000)
    const event = await runWithServices(
      Effect.flatMap(EventService, (events) => events.createEvent({ kind: 1, content: "now" }, TEST_KEY))
    )
    const after = Math.floor(Date.now() / 1000)

    expect(event.created_at).toBeGreaterThanOrEqual(before)
    expect(event.created_at).toBeLessThanOrEqual(after)
    expect(event.tags).toEqual([])
  })
})
