/**
 * EventValidator
 *
 * The trust boundary for relay traffic. An event is accepted only when its id
 * is the hash of its contents, its signature verifies against that id and its
 * author, and it is not dated too far in the future.
 */
import { Clock, Context, Effect, Layer } from "effect"
import { CryptoService } from "./CryptoService.js"
import { EventService } from "./EventService.js"
import { EngineConfig } from "../core/Config.js"
import { BadSignature, FutureTimestamp, IdMismatch, type ValidationError } from "../core/Errors.js"
import type { NostrEvent } from "../core/Schema.js"

// =============================================================================
// Service Interface
// =============================================================================

export interface EventValidator {
  readonly _tag: "EventValidator"

  /**
   * Checks run in order and stop at the first failure:
   * IdMismatch, then BadSignature, then FutureTimestamp.
   */
  validate(candidate: NostrEvent): Effect.Effect<NostrEvent, ValidationError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const EventValidator = Context.GenericTag<EventValidator>("EventValidator")

// =============================================================================
// Service Implementation
// =============================================================================

const make = Effect.gen(function* () {
  const crypto = yield* CryptoService
  const events = yield* EventService
  const { maxFutureSkewSeconds } = yield* EngineConfig

  const validate: EventValidator["validate"] = (candidate) =>
    Effect.gen(function* () {
      const computedId = yield* events.computeEventId(candidate).pipe(Effect.orElseSucceed(() => ""))
      if (computedId !== candidate.id) {
        return yield* new IdMismatch({
          message: "Event id does not match its contents",
          claimedId: candidate.id,
          computedId,
        })
      }

      const verified = yield* crypto.verify(candidate.sig, candidate.id, candidate.pubkey)
      if (!verified) {
        return yield* new BadSignature({
          message: "Signature does not verify against id and pubkey",
          eventId: candidate.id,
        })
      }

      const nowSeconds = Math.floor((yield* Clock.currentTimeMillis) / 1000)
      const limit = nowSeconds + maxFutureSkewSeconds
      if (candidate.created_at > limit) {
        return yield* new FutureTimestamp({
          message: `created_at is more than ${maxFutureSkewSeconds}s ahead of the local clock`,
          eventId: candidate.id,
          createdAt: candidate.created_at,
          limit,
        })
      }

      return candidate
    })

  return {
    _tag: "EventValidator" as const,
    validate,
  }
})

// =============================================================================
// Service Layer
// =============================================================================

export const EventValidatorLive = Layer.effect(EventValidator, make)
