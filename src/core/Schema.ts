/**
 * NIP-01 Core Schemas
 *
 * Event, filter and wire-frame schemas using Effect Schema, plus the tagged
 * message variants the codec produces.
 * @see https://github.com/nostr-protocol/nips/blob/master/01.md
 */
import { Schema } from "@effect/schema"
import { Data } from "effect"

// =============================================================================
// Branded Primitive Types
// =============================================================================

const Hex64 = Schema.String.pipe(Schema.pattern(/^[a-f0-9]{64}$/))

/** 64-character lowercase hex string (sha256 of the canonical serialization) */
export const EventId = Hex64.pipe(Schema.brand("EventId"))
export type EventId = typeof EventId.Type

/** 64-character lowercase hex string (x-only secp256k1 public key) */
export const PublicKey = Hex64.pipe(Schema.brand("PublicKey"))
export type PublicKey = typeof PublicKey.Type

/** 64-character lowercase hex string (secp256k1 private key) */
export const PrivateKey = Hex64.pipe(Schema.brand("PrivateKey"))
export type PrivateKey = typeof PrivateKey.Type

/** 128-character lowercase hex string (BIP-340 schnorr signature) */
export const Signature = Schema.String.pipe(
  Schema.pattern(/^[a-f0-9]{128}$/),
  Schema.brand("Signature")
)
export type Signature = typeof Signature.Type

/** Unix timestamp in seconds */
export const UnixTimestamp = Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0))
export type UnixTimestamp = typeof UnixTimestamp.Type

/** Event kind (0-65535) */
export const EventKind = Schema.Number.pipe(
  Schema.int(),
  Schema.greaterThanOrEqualTo(0),
  Schema.lessThanOrEqualTo(65535)
)
export type EventKind = typeof EventKind.Type

export const Tag = Schema.Array(Schema.String)
export type Tag = typeof Tag.Type

/** Subscription ID (1-64 characters) */
export const SubscriptionId = Schema.String.pipe(
  Schema.minLength(1),
  Schema.maxLength(64),
  Schema.brand("SubscriptionId")
)
export type SubscriptionId = typeof SubscriptionId.Type

// =============================================================================
// Event Types
// =============================================================================

/** Signed Nostr event */
export const NostrEvent = Schema.Struct({
  id: EventId,
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
  sig: Signature,
})
export type NostrEvent = typeof NostrEvent.Type

/** Unsigned event (before id and signature) */
export const UnsignedEvent = Schema.Struct({
  pubkey: PublicKey,
  created_at: UnixTimestamp,
  kind: EventKind,
  tags: Schema.Array(Tag),
  content: Schema.String,
})
export type UnsignedEvent = typeof UnsignedEvent.Type

// =============================================================================
// Filter Type
// =============================================================================

/** Key of a tag query such as `#e`, `#p` or `#t` */
export const TagQueryKey = Schema.TemplateLiteral(Schema.Literal("#"), Schema.String)
export type TagQueryKey = typeof TagQueryKey.Type

export const isTagQueryKey = (key: string): key is TagQueryKey =>
  key.length > 1 && key.startsWith("#")

/** Event filter for subscriptions and stored queries */
export const Filter = Schema.Struct(
  {
    ids: Schema.optional(Schema.Array(Hex64)),
    authors: Schema.optional(Schema.Array(Hex64)),
    kinds: Schema.optional(Schema.Array(EventKind)),
    since: Schema.optional(UnixTimestamp),
    until: Schema.optional(UnixTimestamp),
    limit: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0))),
  },
  Schema.Record({ key: TagQueryKey, value: Schema.Array(Schema.String) })
)
export type Filter = typeof Filter.Type

// =============================================================================
// Wire Frames (Client → Relay)
// =============================================================================

/** ["EVENT", event] */
export const ClientEventFrame = Schema.Tuple(Schema.Literal("EVENT"), NostrEvent)

/** ["REQ", subId, filter, filter, ...] */
export const ClientReqFrame = Schema.Tuple([Schema.Literal("REQ"), SubscriptionId], Filter)

/** ["CLOSE", subId] */
export const ClientCloseFrame = Schema.Tuple(Schema.Literal("CLOSE"), SubscriptionId)

/** ["AUTH", event] (NIP-42, kind 22242 event) */
export const ClientAuthFrame = Schema.Tuple(Schema.Literal("AUTH"), NostrEvent)

// =============================================================================
// Wire Frames (Relay → Client)
// =============================================================================

/** ["EVENT", subId, event] */
export const RelayEventFrame = Schema.Tuple(Schema.Literal("EVENT"), SubscriptionId, NostrEvent)

/** ["OK", eventId, accepted, message] (older relays omit the message) */
export const RelayOkFrame = Schema.Tuple(
  Schema.Literal("OK"),
  EventId,
  Schema.Boolean,
  Schema.optionalElement(Schema.String)
)

/** ["EOSE", subId] */
export const RelayEoseFrame = Schema.Tuple(Schema.Literal("EOSE"), SubscriptionId)

/** ["CLOSED", subId, message] */
export const RelayClosedFrame = Schema.Tuple(
  Schema.Literal("CLOSED"),
  SubscriptionId,
  Schema.String
)

/** ["NOTICE", message] */
export const RelayNoticeFrame = Schema.Tuple(Schema.Literal("NOTICE"), Schema.String)

/** ["AUTH", challenge] (NIP-42) */
export const RelayAuthFrame = Schema.Tuple(Schema.Literal("AUTH"), Schema.String)

// =============================================================================
// Decoded Messages
// =============================================================================

/** Messages a client sends to a relay */
export type ClientMessage = Data.TaggedEnum<{
  Req: { readonly subscriptionId: SubscriptionId; readonly filters: ReadonlyArray<Filter> }
  Close: { readonly subscriptionId: SubscriptionId }
  Event: { readonly event: NostrEvent }
  Auth: { readonly event: NostrEvent }
}>
export const ClientMessage = Data.taggedEnum<ClientMessage>()

/**
 * Messages a relay sends to a client.
 *
 * `Unknown` carries frames whose type this engine does not speak; they are
 * kept rather than rejected so newer relay extensions do not read as garbage.
 */
export type RelayMessage = Data.TaggedEnum<{
  Event: { readonly subscriptionId: SubscriptionId; readonly event: NostrEvent }
  Eose: { readonly subscriptionId: SubscriptionId }
  Ok: { readonly eventId: EventId; readonly accepted: boolean; readonly message: string }
  Notice: { readonly message: string }
  Closed: { readonly subscriptionId: SubscriptionId; readonly message: string }
  Auth: { readonly challenge: string }
  Unknown: { readonly type: string; readonly frame: ReadonlyArray<unknown> }
}>
export const RelayMessage = Data.taggedEnum<RelayMessage>()

// =============================================================================
// Event Kinds
// =============================================================================

/** Short text note */
export const TEXT_NOTE_KIND = 1

/** Client authentication (NIP-42) */
export const AUTH_EVENT_KIND = 22242
