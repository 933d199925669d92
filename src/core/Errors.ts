/**
 * Typed Error Classes
 *
 * All errors extend Schema.TaggedError so they can cross the error channel
 * and be matched with `Effect.catchTag`.
 */
import { Schema } from "@effect/schema"

// =============================================================================
// Codec Errors
// =============================================================================

/** A relay frame that is not a well-formed protocol message */
export class MalformedFrame extends Schema.TaggedError<MalformedFrame>()(
  "MalformedFrame",
  {
    message: Schema.String,
    frame: Schema.String,
  }
) {}

export type CodecError = MalformedFrame

// =============================================================================
// Validation Errors
// =============================================================================

export class IdMismatch extends Schema.TaggedError<IdMismatch>()(
  "IdMismatch",
  {
    message: Schema.String,
    claimedId: Schema.String,
    computedId: Schema.String,
  }
) {}

export class BadSignature extends Schema.TaggedError<BadSignature>()(
  "BadSignature",
  {
    message: Schema.String,
    eventId: Schema.String,
  }
) {}

export class FutureTimestamp extends Schema.TaggedError<FutureTimestamp>()(
  "FutureTimestamp",
  {
    message: Schema.String,
    eventId: Schema.String,
    createdAt: Schema.Number,
    limit: Schema.Number,
  }
) {}

export type ValidationError = IdMismatch | BadSignature | FutureTimestamp

// =============================================================================
// Crypto Errors
// =============================================================================

export class CryptoError extends Schema.TaggedError<CryptoError>()(
  "CryptoError",
  {
    message: Schema.String,
    operation: Schema.Literal("sign", "hash", "generateKey"),
  }
) {}

export class InvalidPrivateKey extends Schema.TaggedError<InvalidPrivateKey>()(
  "InvalidPrivateKey",
  { message: Schema.String }
) {}

// =============================================================================
// Transport Errors
// =============================================================================

export class TransportError extends Schema.TaggedError<TransportError>()(
  "TransportError",
  {
    message: Schema.String,
    url: Schema.String,
    reason: Schema.Literal("connect", "timeout", "closed", "send"),
  }
) {}

export class InvalidRelayUrl extends Schema.TaggedError<InvalidRelayUrl>()(
  "InvalidRelayUrl",
  {
    message: Schema.String,
    url: Schema.String,
  }
) {}

// =============================================================================
// Storage Errors
// =============================================================================

export class StoreError extends Schema.TaggedError<StoreError>()(
  "StoreError",
  {
    message: Schema.String,
    operation: Schema.Literal("put", "query"),
  }
) {}

// =============================================================================
// Subscription Errors
// =============================================================================

export class SubscriptionNotFound extends Schema.TaggedError<SubscriptionNotFound>()(
  "SubscriptionNotFound",
  { subscriptionId: Schema.String }
) {}
