/**
 * Wire Codec
 *
 * Converts between NIP-01 JSON-array frames and the tagged message variants
 * in Schema.ts. Every function here is pure.
 */
import { Schema } from "@effect/schema"
import { Either } from "effect"
import { MalformedFrame } from "./Errors.js"
import {
  ClientAuthFrame,
  ClientCloseFrame,
  ClientEventFrame,
  ClientMessage,
  ClientReqFrame,
  RelayAuthFrame,
  RelayClosedFrame,
  RelayEoseFrame,
  RelayEventFrame,
  RelayMessage,
  RelayNoticeFrame,
  RelayOkFrame,
} from "./Schema.js"

export type RawFrame = string | Uint8Array

const utf8 = new TextDecoder("utf-8", { fatal: true })

const preview = (text: string): string => (text.length > 200 ? `${text.slice(0, 200)}…` : text)

const malformed = (message: string, text: string) =>
  new MalformedFrame({ message, frame: preview(text) })

/**
 * Parse a raw frame down to a non-empty array with a string head.
 */
const parseFrame = (
  raw: RawFrame
): Either.Either<readonly [string, ReadonlyArray<unknown>, string], MalformedFrame> => {
  let text: string
  if (typeof raw === "string") {
    text = raw
  } else {
    try {
      text = utf8.decode(raw)
    } catch {
      return Either.left(malformed("Frame is not valid UTF-8", ""))
    }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return Either.left(malformed("Frame is not valid JSON", text))
  }

  if (!Array.isArray(parsed) || parsed.length === 0) {
    return Either.left(malformed("Frame is not a non-empty JSON array", text))
  }
  const frame: ReadonlyArray<unknown> = parsed
  const head = frame[0]
  if (typeof head !== "string") {
    return Either.left(malformed("Frame type is not a string", text))
  }
  return Either.right([head, frame, text] as const)
}

const decodeShape = <A, I>(schema: Schema.Schema<A, I>, frame: ReadonlyArray<unknown>, text: string) =>
  Schema.decodeUnknownEither(schema)(frame).pipe(
    Either.mapLeft((error) => malformed(error.message, text))
  )

// =============================================================================
// Client → Relay
// =============================================================================

/**
 * Encode a client message as one JSON text frame
 */
export const encodeClientMessage = (message: ClientMessage): string =>
  JSON.stringify(
    ClientMessage.$match(message, {
      Req: ({ subscriptionId, filters }) => ["REQ", subscriptionId, ...filters],
      Close: ({ subscriptionId }) => ["CLOSE", subscriptionId],
      Event: ({ event }) => ["EVENT", event],
      Auth: ({ event }) => ["AUTH", event],
    })
  )

/**
 * Decode a client frame. Used by relay stand-ins and round-trip checks;
 * a client never receives these.
 */
export const decodeClientMessage = (raw: RawFrame): Either.Either<ClientMessage, MalformedFrame> =>
  Either.flatMap(parseFrame(raw), ([type, frame, text]): Either.Either<ClientMessage, MalformedFrame> => {
    switch (type) {
      case "REQ":
        return decodeShape(ClientReqFrame, frame, text).pipe(
          Either.map(([, subscriptionId, ...filters]) => ClientMessage.Req({ subscriptionId, filters }))
        )
      case "CLOSE":
        return decodeShape(ClientCloseFrame, frame, text).pipe(
          Either.map(([, subscriptionId]) => ClientMessage.Close({ subscriptionId }))
        )
      case "EVENT":
        return decodeShape(ClientEventFrame, frame, text).pipe(
          Either.map(([, event]) => ClientMessage.Event({ event }))
        )
      case "AUTH":
        return decodeShape(ClientAuthFrame, frame, text).pipe(
          Either.map(([, event]) => ClientMessage.Auth({ event }))
        )
      default:
        return Either.left(malformed(`Unsupported client message type: ${type}`, text))
    }
  })

// =============================================================================
// Relay → Client
// =============================================================================

/**
 * Decode a relay frame.
 *
 * Unknown message types decode to `RelayMessage.Unknown`; only frames that are
 * not JSON arrays, or known types with the wrong shape, are malformed.
 */
export const decodeRelayMessage = (raw: RawFrame): Either.Either<RelayMessage, MalformedFrame> =>
  Either.flatMap(parseFrame(raw), ([type, frame, text]): Either.Either<RelayMessage, MalformedFrame> => {
    switch (type) {
      case "EVENT":
        return decodeShape(RelayEventFrame, frame, text).pipe(
          Either.map(([, subscriptionId, event]) => RelayMessage.Event({ subscriptionId, event }))
        )
      case "EOSE":
        return decodeShape(RelayEoseFrame, frame, text).pipe(
          Either.map(([, subscriptionId]) => RelayMessage.Eose({ subscriptionId }))
        )
      case "OK":
        return decodeShape(RelayOkFrame, frame, text).pipe(
          Either.map(([, eventId, accepted, message]) =>
            RelayMessage.Ok({ eventId, accepted, message: message ?? "" })
          )
        )
      case "NOTICE":
        return decodeShape(RelayNoticeFrame, frame, text).pipe(
          Either.map(([, message]) => RelayMessage.Notice({ message }))
        )
      case "CLOSED":
        return decodeShape(RelayClosedFrame, frame, text).pipe(
          Either.map(([, subscriptionId, message]) => RelayMessage.Closed({ subscriptionId, message }))
        )
      case "AUTH":
        return decodeShape(RelayAuthFrame, frame, text).pipe(
          Either.map(([, challenge]) => RelayMessage.Auth({ challenge }))
        )
      default:
        return Either.right(RelayMessage.Unknown({ type, frame }))
    }
  })

/**
 * Encode a relay message as one JSON text frame
 */
export const encodeRelayMessage = (message: RelayMessage): string =>
  JSON.stringify(
    RelayMessage.$match(message, {
      Event: ({ subscriptionId, event }) => ["EVENT", subscriptionId, event],
      Eose: ({ subscriptionId }) => ["EOSE", subscriptionId],
      Ok: ({ eventId, accepted, message }) => ["OK", eventId, accepted, message],
      Notice: ({ message }) => ["NOTICE", message],
      Closed: ({ subscriptionId, message }) => ["CLOSED", subscriptionId, message],
      Auth: ({ challenge }) => ["AUTH", challenge],
      Unknown: ({ frame }) => frame,
    })
  )
