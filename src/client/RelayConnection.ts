/**
 * RelayConnection
 *
 * The actor owning one relay session. It runs its own fiber through
 * connect → (auth) → resubscribe → stream, and back through backoff when the
 * transport fails. Decoding and event validation happen here, in the relay's
 * fiber; only checked messages are offered to the router inbox.
 */
import { Cause, Clock, Data, Duration, Effect, Either, PubSub, Queue, Random, Stream } from "effect"
import { decodeRelayMessage, encodeClientMessage } from "../core/Codec.js"
import { EngineConfig } from "../core/Config.js"
import { TransportError } from "../core/Errors.js"
import { makeAuthTemplate } from "../core/Nip42.js"
import {
  ClientMessage,
  type Filter,
  type PrivateKey,
  type RelayMessage,
  type SubscriptionId,
} from "../core/Schema.js"
import { EventService } from "../services/EventService.js"
import { EventValidator } from "../services/EventValidator.js"
import { backoffDelay, canRetry } from "./Backoff.js"
import { PoolNotice, type ConnectionState } from "./PoolNotice.js"
import { Transport, type TransportSession } from "./Transport.js"

export type { ConnectionState } from "./PoolNotice.js"

// =============================================================================
// Types
// =============================================================================

export interface RelaySnapshot {
  readonly url: string
  readonly connectionId: string
  readonly state: ConnectionState
  readonly retryCount: number
  /** Epoch milliseconds of the last transport failure */
  readonly lastFailure: number | undefined
  readonly lastError: string | undefined
  readonly activeSubscriptions: ReadonlyArray<SubscriptionId>
  readonly pendingWrites: number
}

/** What a connection reports to the router inbox */
export type ConnectionReport = Data.TaggedEnum<{
  StateChanged: {
    readonly connectionId: string
    readonly url: string
    readonly state: ConnectionState
    readonly reason: string | undefined
    /** Number of the newest session opened; on "disconnected", the one that ended */
    readonly session: number
  }
  Received: {
    readonly connectionId: string
    readonly url: string
    readonly message: RelayMessage
  }
}>
export const ConnectionReport = Data.taggedEnum<ConnectionReport>()

export type SendOutcome = Data.TaggedEnum<{
  /** Written on the live session numbered `session` */
  Sent: { readonly session: number }
  /** Waits for the next session */
  Buffered: {}
  /** The connection has failed for good */
  Dropped: {}
}>
export const SendOutcome = Data.taggedEnum<SendOutcome>()

export interface RelayConnection {
  readonly url: string
  readonly connectionId: string

  readonly snapshot: Effect.Effect<RelaySnapshot>

  readonly state: Effect.Effect<ConnectionState>

  /**
   * Record a subscription as held by this relay and send its REQ if a
   * session is open. Assigned subscriptions are re-sent on every reconnect.
   */
  assign(subscriptionId: SubscriptionId, filters: ReadonlyArray<Filter>): Effect.Effect<void>

  /**
   * Forget a subscription and send CLOSE if a session is open
   */
  release(subscriptionId: SubscriptionId): Effect.Effect<void>

  /**
   * Write an EVENT or AUTH frame, buffering it while disconnected
   */
  send(message: ClientMessage): Effect.Effect<SendOutcome>

  /**
   * The actor loop. Returns only when the connection has failed for good;
   * interrupt it to shut the connection down.
   */
  readonly run: Effect.Effect<void>
}

export interface RelayConnectionParams {
  readonly url: string
  readonly connectionId: string
  readonly reports: Queue.Enqueue<ConnectionReport>
  readonly notices: PubSub.PubSub<PoolNotice>
  readonly authKey?: PrivateKey | undefined
}

interface AssignedSubscription {
  readonly filters: ReadonlyArray<Filter>
  /** Newest created_at this relay delivered for the subscription */
  newestSeen: number | undefined
}

interface PendingWrite {
  readonly frame: string
  readonly label: string
}

// =============================================================================
// Implementation
// =============================================================================

export const makeRelayConnection = (params: RelayConnectionParams) =>
  Effect.gen(function* () {
    const transport = yield* Transport
    const validator = yield* EventValidator
    const events = yield* EventService
    const config = yield* EngineConfig
    const { url, connectionId, reports, notices, authKey } = params

    // Actor state. Only this module touches it, and every mutation happens
    // between yields, so no two fibers interleave inside one update.
    let state: ConnectionState = "disconnected"
    let retryCount = 0
    let lastFailure: number | undefined
    let lastError: string | undefined
    let session: TransportSession | null = null
    // Sessions opened so far; the live one, if any, is this number
    let sessionCount = 0
    let flushing = false
    const subscriptions = new Map<SubscriptionId, AssignedSubscription>()
    const pending: PendingWrite[] = []

    const annotate = Effect.annotateLogs({ relay: url })

    const transition = (next: ConnectionState, reason?: string) =>
      Effect.gen(function* () {
        if (state === next) return
        state = next
        yield* Effect.logInfo(`Relay ${next}`).pipe(
          Effect.annotateLogs(reason === undefined ? {} : { reason }),
          annotate
        )
        yield* PubSub.publish(notices, PoolNotice.RelayStateChanged({ relay: url, state: next, reason }))
        yield* Queue.offer(
          reports,
          ConnectionReport.StateChanged({ connectionId, url, state: next, reason, session: sessionCount })
        )
      })

    const resumeFilters = (assigned: AssignedSubscription): ReadonlyArray<Filter> => {
      const newest = assigned.newestSeen
      if (!config.sinceOptimize || newest === undefined) return assigned.filters
      return assigned.filters.map((filter) => ({
        ...filter,
        since: Math.max(filter.since ?? 0, newest),
      }))
    }

    const writeBestEffort = (current: TransportSession, message: ClientMessage) =>
      current.send(encodeClientMessage(message)).pipe(
        Effect.catchAll((error) =>
          Effect.logDebug(`Write failed: ${error.message}`).pipe(annotate)
        )
      )

    const dropOverflow = Effect.gen(function* () {
      while (pending.length > config.outboundBufferSize) {
        const dropped = pending.shift()
        if (dropped === undefined) return
        yield* Effect.logWarning(`Outbound buffer full, dropped oldest ${dropped.label} frame`).pipe(annotate)
        yield* PubSub.publish(notices, PoolNotice.OutboundOverflow({ relay: url, dropped: dropped.label }))
      }
    })

    const buffer = (write: PendingWrite) =>
      Effect.suspend(() => {
        pending.push(write)
        return dropOverflow
      })

    const send: RelayConnection["send"] = (message) =>
      Effect.gen(function* () {
        if (state === "failed") return SendOutcome.Dropped()
        const write: PendingWrite = { frame: encodeClientMessage(message), label: message._tag }
        const current = session
        const sessionNumber = sessionCount
        if (current !== null && !flushing) {
          const result = yield* Effect.either(current.send(write.frame))
          if (Either.isRight(result)) return SendOutcome.Sent({ session: sessionNumber })
        }
        yield* buffer(write)
        return SendOutcome.Buffered()
      })

    const answerChallenge = (challenge: string) => {
      if (authKey === undefined) {
        return Effect.logDebug("Ignoring AUTH challenge, no auth key configured").pipe(annotate)
      }
      return events.createEvent(makeAuthTemplate(url, challenge), authKey).pipe(
        Effect.flatMap((event) => send(ClientMessage.Auth({ event }))),
        Effect.flatMap((outcome) => Effect.logDebug(`Answered AUTH challenge (${outcome._tag})`).pipe(annotate)),
        Effect.catchAll((error) =>
          Effect.logWarning(`Failed to answer AUTH challenge: ${error.message}`).pipe(annotate)
        )
      )
    }

    const handleFrame = (raw: string) =>
      Effect.gen(function* () {
        const decoded = decodeRelayMessage(raw)
        if (Either.isLeft(decoded)) {
          yield* Effect.logDebug(`Dropped malformed frame: ${decoded.left.message}`).pipe(annotate)
          return
        }
        retryCount = 0
        const message = decoded.right

        if ("subscriptionId" in message && !subscriptions.has(message.subscriptionId)) {
          yield* Effect.logDebug(`Dropped ${message._tag} for a subscription this relay does not hold`).pipe(
            Effect.annotateLogs({ subscription: message.subscriptionId }),
            annotate
          )
          return
        }

        switch (message._tag) {
          case "Event": {
            const checked = yield* Effect.either(validator.validate(message.event))
            if (Either.isLeft(checked)) {
              yield* Effect.logDebug(`Dropped invalid event: ${checked.left._tag}`).pipe(
                Effect.annotateLogs({ eventId: message.event.id }),
                annotate
              )
              return
            }
            const assigned = subscriptions.get(message.subscriptionId)
            if (
              assigned !== undefined &&
              (assigned.newestSeen === undefined || message.event.created_at > assigned.newestSeen)
            ) {
              assigned.newestSeen = message.event.created_at
            }
            break
          }
          case "Closed":
            subscriptions.delete(message.subscriptionId)
            break
          case "Auth":
            yield* answerChallenge(message.challenge)
            return
          case "Unknown":
            yield* Effect.logDebug(`Ignored unknown message type ${message.type}`).pipe(annotate)
            return
          case "Eose":
          case "Ok":
          case "Notice":
            break
        }

        yield* Queue.offer(reports, ConnectionReport.Received({ connectionId, url, message }))
      })

    const runSession = Effect.scoped(
      Effect.gen(function* () {
        const opened = yield* transport.open(url).pipe(
          Effect.timeoutFail({
            duration: Duration.millis(config.connectTimeoutMs),
            onTimeout: () =>
              new TransportError({
                message: `No handshake within ${config.connectTimeoutMs}ms`,
                url,
                reason: "timeout",
              }),
          })
        )

        yield* Effect.addFinalizer(() =>
          Effect.sync(() => {
            session = null
            flushing = false
          })
        )
        // Subscriptions assigned from here on send their own REQ.
        session = opened
        sessionCount += 1
        flushing = true
        const resume = Array.from(subscriptions)

        for (const [subscriptionId, assigned] of resume) {
          yield* opened.send(
            encodeClientMessage(ClientMessage.Req({ subscriptionId, filters: resumeFilters(assigned) }))
          )
        }
        // A frame leaves the buffer before its write starts, so overflow
        // during the write never drops it; a failed write puts it back.
        while (pending.length > 0) {
          const next = pending.shift()
          if (next === undefined) break
          yield* opened.send(next.frame).pipe(
            Effect.tapError(() =>
              Effect.suspend(() => {
                pending.unshift(next)
                return dropOverflow
              })
            )
          )
        }
        flushing = false

        yield* transition("connected")
        yield* Stream.runForEach(opened.frames, handleFrame)
        return yield* new TransportError({ message: "Relay ended the session", url, reason: "closed" })
      })
    )

    const run: RelayConnection["run"] = Effect.gen(function* () {
      while (true) {
        yield* transition("connecting")
        const failure = yield* runSession.pipe(
          Effect.flip,
          Effect.map((error) => error.message),
          Effect.catchAllCause((cause) => Effect.succeed(Cause.pretty(cause)))
        )

        lastFailure = yield* Clock.currentTimeMillis
        lastError = failure
        retryCount += 1

        if (!canRetry(config.reconnect, retryCount)) {
          if (pending.length > 0) {
            yield* Effect.logWarning(`Discarding ${pending.length} buffered frames`).pipe(annotate)
            pending.length = 0
          }
          yield* transition("failed", failure)
          return
        }

        yield* transition("disconnected", failure)
        const delay = backoffDelay(config.reconnect, retryCount - 1, yield* Random.next)
        yield* Effect.logDebug(`Reconnecting in ${delay}ms`).pipe(annotate)
        yield* Effect.sleep(Duration.millis(delay))
      }
    })

    const connection: RelayConnection = {
      url,
      connectionId,

      snapshot: Effect.sync(() => ({
        url,
        connectionId,
        state,
        retryCount,
        lastFailure,
        lastError,
        activeSubscriptions: Array.from(subscriptions.keys()),
        pendingWrites: pending.length,
      })),

      state: Effect.sync(() => state),

      assign: (subscriptionId, filters) =>
        Effect.gen(function* () {
          subscriptions.set(subscriptionId, { filters, newestSeen: undefined })
          const current = session
          if (current !== null) {
            yield* writeBestEffort(current, ClientMessage.Req({ subscriptionId, filters }))
          }
        }),

      release: (subscriptionId) =>
        Effect.gen(function* () {
          if (!subscriptions.delete(subscriptionId)) return
          const current = session
          if (current !== null) {
            yield* writeBestEffort(current, ClientMessage.Close({ subscriptionId }))
          }
        }),

      send,
      run,
    }

    return connection
  })
