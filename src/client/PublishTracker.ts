/**
 * PublishTracker
 *
 * Correlates relay `OK` messages with in-flight publishes, per connection.
 */
import { Data, Deferred, Effect } from "effect"
import type { EventId } from "../core/Schema.js"

export type PublishOutcome = Data.TaggedEnum<{
  /** Relay answered `OK true` */
  Accepted: { readonly message: string }
  /** Relay answered `OK false` */
  Rejected: { readonly message: string }
  /** The relay was not connected; `queued` frames go out on reconnect */
  TransportFailed: { readonly reason: string; readonly queued: boolean }
  TimedOut: {}
}>
export const PublishOutcome = Data.taggedEnum<PublishOutcome>()

export interface PublishTracker {
  /**
   * The pending result for `eventId` on a connection, created on first use
   */
  expect(connectionId: string, eventId: EventId): Effect.Effect<Deferred.Deferred<PublishOutcome>>

  /**
   * Record the session a pending publish was written on. If that session
   * has already been reported as ended, the publish fails at once.
   */
  sentOn(connectionId: string, eventId: EventId, session: number): Effect.Effect<void>

  /**
   * Complete a pending result. Returns false when nothing was waiting.
   */
  resolve(connectionId: string, eventId: EventId, outcome: PublishOutcome): Effect.Effect<boolean>

  /**
   * Fail pending publishes on a connection as a transport failure. With
   * `endedSession`, only those written on that session or earlier fail;
   * without it, all of them do.
   */
  failConnection(connectionId: string, reason: string, endedSession?: number): Effect.Effect<void>

  forget(connectionId: string, eventId: EventId): Effect.Effect<void>
}

interface Waiter {
  readonly deferred: Deferred.Deferred<PublishOutcome>
  /** Unset until the write has gone out */
  session: number | undefined
}

interface EndedSession {
  readonly session: number
  readonly reason: string
}

export const makePublishTracker = (): PublishTracker => {
  const pending = new Map<string, Map<EventId, Waiter>>()
  const ended = new Map<string, EndedSession>()

  const take = (connectionId: string, eventId: EventId) => {
    const forConnection = pending.get(connectionId)
    const waiter = forConnection?.get(eventId)
    if (forConnection !== undefined && waiter !== undefined) {
      forConnection.delete(eventId)
      if (forConnection.size === 0) pending.delete(connectionId)
    }
    return waiter
  }

  const transportFailed = (waiter: Waiter, reason: string) =>
    Deferred.succeed(waiter.deferred, PublishOutcome.TransportFailed({ reason, queued: false }))

  return {
    expect: (connectionId, eventId) =>
      Effect.gen(function* () {
        let forConnection = pending.get(connectionId)
        if (forConnection === undefined) {
          forConnection = new Map()
          pending.set(connectionId, forConnection)
        }
        const existing = forConnection.get(eventId)
        if (existing !== undefined) return existing.deferred
        const created = yield* Deferred.make<PublishOutcome>()
        forConnection.set(eventId, { deferred: created, session: undefined })
        return created
      }),

    sentOn: (connectionId, eventId, session) =>
      Effect.suspend(() => {
        const waiter = pending.get(connectionId)?.get(eventId)
        if (waiter === undefined) return Effect.void
        waiter.session = session
        const last = ended.get(connectionId)
        if (last === undefined || session > last.session) return Effect.void
        take(connectionId, eventId)
        return transportFailed(waiter, last.reason)
      }),

    resolve: (connectionId, eventId, outcome) =>
      Effect.suspend(() => {
        const waiter = take(connectionId, eventId)
        return waiter === undefined ? Effect.succeed(false) : Deferred.succeed(waiter.deferred, outcome)
      }),

    failConnection: (connectionId, reason, endedSession) =>
      Effect.suspend(() => {
        if (endedSession === undefined) {
          ended.delete(connectionId)
        } else {
          const last = ended.get(connectionId)
          if (last === undefined || endedSession > last.session) {
            ended.set(connectionId, { session: endedSession, reason })
          }
        }
        const forConnection = pending.get(connectionId)
        if (forConnection === undefined) return Effect.void
        const failing: Waiter[] = []
        for (const [eventId, waiter] of Array.from(forConnection)) {
          const wasOnEndedSession =
            endedSession === undefined || (waiter.session !== undefined && waiter.session <= endedSession)
          if (!wasOnEndedSession) continue
          forConnection.delete(eventId)
          failing.push(waiter)
        }
        if (forConnection.size === 0) pending.delete(connectionId)
        return Effect.forEach(failing, (waiter) => transportFailed(waiter, reason), { discard: true })
      }),

    forget: (connectionId, eventId) =>
      Effect.sync(() => {
        take(connectionId, eventId)
      }),
  }
}
