/**
 * SubscriptionRouter
 *
 * The single writer for subscription state. Consumer operations and inbound
 * relay reports all run under one permit, so dedup decisions, EOSE
 * aggregation and fan-out happen in arrival order.
 */
import { Chunk, type Data, Effect, Option, PubSub, Queue, Stream } from "effect"
import { EngineConfig } from "../core/Config.js"
import { SubscriptionId, type Filter } from "../core/Schema.js"
import {
  FeedItem,
  LOCAL_SOURCE,
  makeIngestionPipeline,
  type FeedTarget,
  type IngestionPipeline,
} from "./IngestionPipeline.js"
import { makeDedupCache } from "./DedupCache.js"
import { NoteStore } from "./NoteStore.js"
import { PoolNotice } from "./PoolNotice.js"
import { PublishOutcome, type PublishTracker } from "./PublishTracker.js"
import type { ConnectionReport, RelayConnection } from "./RelayConnection.js"
import type { RelaySelectionPolicy } from "./RelaySelection.js"

// =============================================================================
// Types
// =============================================================================

/** Subscription handle returned by subscribe */
export interface SubscriptionHandle {
  readonly id: SubscriptionId
  /** Ends when the subscription is closed */
  readonly feed: Stream.Stream<FeedItem>
  readonly close: () => Effect.Effect<void>
}

export interface SubscriptionInfo {
  readonly id: SubscriptionId
  readonly filters: ReadonlyArray<Filter>
  /** URLs of the relays the subscription is dispatched to */
  readonly relays: ReadonlyArray<string>
  readonly eoseReceived: ReadonlyArray<string>
  readonly caughtUp: boolean
}

export interface SubscriptionRouter {
  subscribe(filters: ReadonlyArray<Filter>): Effect.Effect<SubscriptionHandle>

  /**
   * Send CLOSE to every relay holding the subscription and end its feed.
   * Unknown ids are ignored.
   */
  unsubscribe(id: SubscriptionId): Effect.Effect<void>

  routeIncoming(report: ConnectionReport): Effect.Effect<void>

  /**
   * Forget a connection the pool has removed. Its pending publishes fail and
   * subscriptions waiting on its EOSE are re-evaluated.
   */
  relayRemoved(connectionId: string): Effect.Effect<void>

  describe(id: SubscriptionId): Effect.Effect<Option.Option<SubscriptionInfo>>

  /**
   * Take reports from the inbox and route them, until interrupted
   */
  dispatch(inbox: Queue.Dequeue<ConnectionReport>): Effect.Effect<never>

  /** Close every subscription */
  readonly shutdown: Effect.Effect<void>

  readonly pipeline: IngestionPipeline
}

export interface SubscriptionRouterParams {
  readonly notices: PubSub.PubSub<PoolNotice>
  readonly tracker: PublishTracker
  /** The pool's current connections */
  readonly connections: () => Iterable<RelayConnection>
  readonly selectRelays: RelaySelectionPolicy
}

interface RouterEntry extends FeedTarget {
  readonly queue: Queue.Queue<FeedItem>
  /** connectionId → relay URL */
  readonly relays: Map<string, string>
  readonly eoseReceived: Set<string>
  caughtUp: boolean
}

// =============================================================================
// Implementation
// =============================================================================

export const makeSubscriptionRouter = (params: SubscriptionRouterParams) =>
  Effect.gen(function* () {
    const { notices, tracker, connections, selectRelays } = params
    const store = yield* NoteStore
    const config = yield* EngineConfig
    const lock = yield* Effect.makeSemaphore(1)

    const entries = new Map<SubscriptionId, RouterEntry>()
    let issued = 0

    const pipeline = yield* makeIngestionPipeline({ notices, targets: () => entries.values() })

    const findConnection = (connectionId: string): RelayConnection | undefined => {
      for (const connection of connections()) {
        if (connection.connectionId === connectionId) return connection
      }
      return undefined
    }

    const invariant = (holds: boolean, message: string) => {
      if (holds) return Effect.void
      return config.strictInvariants
        ? Effect.dieMessage(`Router invariant violated: ${message}`)
        : Effect.logWarning(`Router invariant violated: ${message}`)
    }

    const wasIssued = (id: string): boolean => {
      if (!id.startsWith(config.subscriptionIdPrefix)) return false
      const n = Number(id.slice(config.subscriptionIdPrefix.length))
      return Number.isInteger(n) && n >= 1 && n <= issued
    }

    const checkCaughtUp = (entry: RouterEntry) =>
      Effect.gen(function* () {
        for (const connectionId of entry.eoseReceived) {
          yield* invariant(
            entry.relays.has(connectionId),
            `${entry.id} counts EOSE from ${connectionId}, which it does not target`
          )
        }
        if (entry.caughtUp || entry.relays.size === 0) return
        for (const connectionId of entry.relays.keys()) {
          if (!entry.eoseReceived.has(connectionId)) return
        }
        entry.caughtUp = true
        yield* Effect.logDebug("Subscription caught up").pipe(Effect.annotateLogs({ subscription: entry.id }))
        yield* Queue.offer(entry.queue, FeedItem.CaughtUp())
      })

    const dispatchTo = (entry: RouterEntry, connection: RelayConnection) =>
      Effect.gen(function* () {
        entry.relays.set(connection.connectionId, connection.url)
        yield* connection.assign(entry.id, entry.filters)
      })

    const untarget = (connectionId: string, closed: { readonly relay: string; readonly reason: string } | undefined) =>
      Effect.forEach(
        entries.values(),
        (entry) =>
          Effect.gen(function* () {
            if (!entry.relays.delete(connectionId)) return
            entry.eoseReceived.delete(connectionId)
            if (closed !== undefined) {
              yield* Queue.offer(entry.queue, FeedItem.RelayClosed(closed))
            }
            yield* checkCaughtUp(entry)
          }),
        { discard: true }
      )

    const coldStart = (entry: RouterEntry) =>
      Effect.gen(function* () {
        for (const filter of entry.filters) {
          const stored = yield* Stream.runCollect(store.query(filter)).pipe(
            Effect.catchAll((error) =>
              Effect.logWarning(`Cold-start query failed: ${error.message}`).pipe(
                Effect.annotateLogs({ subscription: entry.id }),
                Effect.as(Chunk.empty())
              )
            )
          )
          for (const event of stored) {
            if (!entry.delivered.markSeen(event.id)) continue
            pipeline.markSeen(event.id)
            yield* Queue.offer(entry.queue, FeedItem.Event({ event, source: LOCAL_SOURCE }))
          }
        }
      })

    const unsubscribeUnlocked = (id: SubscriptionId) =>
      Effect.gen(function* () {
        const entry = entries.get(id)
        if (entry === undefined) return
        entries.delete(id)
        for (const connectionId of entry.relays.keys()) {
          const connection = findConnection(connectionId)
          if (connection !== undefined) yield* connection.release(id)
        }
        yield* Queue.shutdown(entry.queue)
        yield* Effect.logDebug("Subscription closed").pipe(Effect.annotateLogs({ subscription: id }))
      })

    const unsubscribe: SubscriptionRouter["unsubscribe"] = (id) => lock.withPermits(1)(unsubscribeUnlocked(id))

    const subscribe: SubscriptionRouter["subscribe"] = (filters) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          issued += 1
          const id = SubscriptionId.make(`${config.subscriptionIdPrefix}${issued}`)
          const queue = yield* Queue.unbounded<FeedItem>()
          const entry: RouterEntry = {
            id,
            filters,
            feed: queue,
            queue,
            delivered: makeDedupCache(config.dedupCapacity),
            relays: new Map(),
            eoseReceived: new Set(),
            caughtUp: false,
          }
          entries.set(id, entry)

          if (config.coldStart) yield* coldStart(entry)

          const candidates = yield* Effect.forEach(Array.from(connections()), (connection) =>
            connection.snapshot.pipe(Effect.map((snapshot) => ({ connection, snapshot })))
          )
          const selected = new Set(
            selectRelays(
              candidates.map(({ snapshot }) => snapshot),
              filters
            ).map((snapshot) => snapshot.connectionId)
          )
          for (const { connection } of candidates) {
            if (selected.has(connection.connectionId)) yield* dispatchTo(entry, connection)
          }

          yield* Effect.logDebug(`Subscription opened on ${entry.relays.size} relays`).pipe(
            Effect.annotateLogs({ subscription: id })
          )

          return {
            id,
            feed: Stream.fromQueue(queue),
            close: () => unsubscribe(id),
          }
        })
      )

    const onConnected = (connectionId: string) =>
      Effect.gen(function* () {
        const connection = findConnection(connectionId)
        if (connection === undefined) return
        const snapshot = yield* connection.snapshot
        for (const entry of entries.values()) {
          if (entry.relays.has(connectionId)) continue
          const chosen = selectRelays([snapshot], entry.filters).some(
            (candidate) => candidate.connectionId === connectionId
          )
          if (chosen) yield* dispatchTo(entry, connection)
        }
      })

    const routeMessage = (report: Data.TaggedEnum.Value<ConnectionReport, "Received">) =>
      Effect.gen(function* () {
        const { connectionId, url, message } = report
        if (findConnection(connectionId) === undefined) {
          yield* Effect.logDebug(`Discarded ${message._tag} from a removed connection`).pipe(
            Effect.annotateLogs({ relay: url })
          )
          return
        }

        switch (message._tag) {
          case "Event":
          case "Eose":
          case "Closed": {
            const entry = entries.get(message.subscriptionId)
            if (entry === undefined || !entry.relays.has(connectionId)) {
              yield* invariant(
                wasIssued(message.subscriptionId),
                `${url} reported ${message._tag} for ${message.subscriptionId}, which was never created`
              )
              return
            }
            if (message._tag === "Event") {
              yield* pipeline.accept(message.event, url)
            } else if (message._tag === "Eose") {
              entry.eoseReceived.add(connectionId)
              yield* checkCaughtUp(entry)
            } else {
              yield* Effect.logInfo(`Relay closed subscription: ${message.message}`).pipe(
                Effect.annotateLogs({ relay: url, subscription: entry.id })
              )
              entry.relays.delete(connectionId)
              entry.eoseReceived.delete(connectionId)
              yield* Queue.offer(entry.queue, FeedItem.RelayClosed({ relay: url, reason: message.message }))
              yield* checkCaughtUp(entry)
            }
            return
          }
          case "Ok": {
            const outcome = message.accepted
              ? PublishOutcome.Accepted({ message: message.message })
              : PublishOutcome.Rejected({ message: message.message })
            const waiting = yield* tracker.resolve(connectionId, message.eventId, outcome)
            if (!waiting) {
              yield* Effect.logDebug("OK for an event nobody is waiting on").pipe(
                Effect.annotateLogs({ relay: url, eventId: message.eventId })
              )
            }
            return
          }
          case "Notice":
            yield* Effect.logInfo(`Relay notice: ${message.message}`).pipe(Effect.annotateLogs({ relay: url }))
            yield* PubSub.publish(notices, PoolNotice.RelayNotice({ relay: url, message: message.message }))
            return
          case "Auth":
          case "Unknown":
            return
        }
      })

    const routeIncoming: SubscriptionRouter["routeIncoming"] = (report) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          if (report._tag === "Received") {
            yield* routeMessage(report)
            return
          }
          const reason = report.reason ?? report.state
          switch (report.state) {
            case "connected":
              yield* onConnected(report.connectionId)
              return
            case "disconnected":
              yield* tracker.failConnection(report.connectionId, reason, report.session)
              return
            case "failed":
              yield* tracker.failConnection(report.connectionId, reason)
              yield* untarget(report.connectionId, { relay: report.url, reason })
              return
            case "connecting":
              return
          }
        })
      )

    const relayRemoved: SubscriptionRouter["relayRemoved"] = (connectionId) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          yield* tracker.failConnection(connectionId, "relay removed")
          yield* untarget(connectionId, undefined)
        })
      )

    const describe: SubscriptionRouter["describe"] = (id) =>
      Effect.sync(() =>
        Option.fromNullable(entries.get(id)).pipe(
          Option.map((entry) => ({
            id: entry.id,
            filters: entry.filters,
            relays: Array.from(entry.relays.values()),
            eoseReceived: Array.from(
              entry.eoseReceived,
              (connectionId) => entry.relays.get(connectionId) ?? connectionId
            ),
            caughtUp: entry.caughtUp,
          }))
        )
      )

    const dispatch: SubscriptionRouter["dispatch"] = (inbox) =>
      Queue.take(inbox).pipe(
        Effect.flatMap(routeIncoming),
        Effect.forever,
        Effect.tapErrorCause((cause) => Effect.logError("Router dispatcher stopped", cause))
      )

    const shutdown: SubscriptionRouter["shutdown"] = lock.withPermits(1)(
      Effect.suspend(() => Effect.forEach(Array.from(entries.keys()), unsubscribeUnlocked, { discard: true }))
    )

    const router: SubscriptionRouter = {
      subscribe,
      unsubscribe,
      routeIncoming,
      relayRemoved,
      describe,
      dispatch,
      shutdown,
      pipeline,
    }
    return router
  })
