/**
 * EventService
 *
 * Canonical serialization, id computation and signing of Nostr events.
 */
import { Clock, Context, Effect, Layer } from "effect"
import { CryptoService } from "./CryptoService.js"
import type { CryptoError, InvalidPrivateKey } from "../core/Errors.js"
import type { EventId, NostrEvent, PrivateKey, Tag, UnsignedEvent } from "../core/Schema.js"

// =============================================================================
// Event Parameters
// =============================================================================

export interface CreateEventParams {
  readonly kind: number
  readonly content: string
  readonly tags?: ReadonlyArray<Tag>
  readonly created_at?: number
}

/**
 * The string whose sha256 is the event id:
 * `[0, pubkey, created_at, kind, tags, content]` as compact JSON.
 */
export const serializeEvent = (event: UnsignedEvent): string =>
  JSON.stringify([0, event.pubkey, event.created_at, event.kind, event.tags, event.content])

// =============================================================================
// Service Interface
// =============================================================================

export interface EventService {
  readonly _tag: "EventService"

  computeEventId(event: UnsignedEvent): Effect.Effect<EventId, CryptoError>

  /**
   * Build, hash and sign an event. `created_at` defaults to the current clock.
   */
  createEvent(
    params: CreateEventParams,
    privateKey: PrivateKey
  ): Effect.Effect<NostrEvent, CryptoError | InvalidPrivateKey>
}

// =============================================================================
// Service Tag
// =============================================================================

export const EventService = Context.GenericTag<EventService>("EventService")

// =============================================================================
// Service Implementation
// =============================================================================

const make = Effect.gen(function* () {
  const crypto = yield* CryptoService

  const computeEventId: EventService["computeEventId"] = (event) => crypto.hash(serializeEvent(event))

  const createEvent: EventService["createEvent"] = (params, privateKey) =>
    Effect.gen(function* () {
      const pubkey = yield* crypto.getPublicKey(privateKey)
      const created_at = params.created_at ?? Math.floor((yield* Clock.currentTimeMillis) / 1000)

      const unsigned: UnsignedEvent = {
        pubkey,
        created_at,
        kind: params.kind,
        tags: params.tags ?? [],
        content: params.content,
      }
      const id = yield* computeEventId(unsigned)
      const sig = yield* crypto.sign(id, privateKey)

      return { id, ...unsigned, sig }
    })

  return {
    _tag: "EventService" as const,
    computeEventId,
    createEvent,
  }
})

// =============================================================================
// Service Layer
// =============================================================================

export const EventServiceLive = Layer.effect(EventService, make)
