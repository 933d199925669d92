/**
 * RelayPool
 *
 * Owner of every relay connection and the consumer-facing API: relay
 * membership, subscriptions with cold start and EOSE aggregation, and
 * per-relay publish results.
 */
import {
  Context,
  Deferred,
  Duration,
  Effect,
  Fiber,
  Layer,
  Option,
  PubSub,
  Queue,
  type Scope,
  type Stream,
} from "effect"
import { EngineConfig, EngineConfigLive, type EngineConfigInput } from "../core/Config.js"
import { SubscriptionNotFound, type InvalidRelayUrl, type StoreError } from "../core/Errors.js"
import {
  ClientMessage,
  type EventId,
  type Filter,
  type NostrEvent,
  type PrivateKey,
  type SubscriptionId,
} from "../core/Schema.js"
import { CryptoServiceLive } from "../services/CryptoService.js"
import { type EventService, EventServiceLive } from "../services/EventService.js"
import { type EventValidator, EventValidatorLive } from "../services/EventValidator.js"
import { NoteStore } from "./NoteStore.js"
import type { PoolNotice } from "./PoolNotice.js"
import { PublishOutcome, makePublishTracker } from "./PublishTracker.js"
import {
  SendOutcome,
  makeRelayConnection,
  type ConnectionReport,
  type RelayConnection,
  type RelaySnapshot,
} from "./RelayConnection.js"
import { allConnectedRelays, type RelaySelectionPolicy } from "./RelaySelection.js"
import { normalizeRelayUrl } from "./RelayUrl.js"
import {
  makeSubscriptionRouter,
  type SubscriptionHandle,
  type SubscriptionInfo,
} from "./SubscriptionRouter.js"
import type { Transport } from "./Transport.js"

// =============================================================================
// Types
// =============================================================================

export interface RelayPublishResult {
  readonly url: string
  readonly outcome: PublishOutcome
}

/** Result of publishing to every relay in the pool */
export interface PublishReport {
  readonly eventId: EventId
  readonly results: ReadonlyArray<RelayPublishResult>
}

export interface RelayPoolOptions {
  /** Which relays a subscription is sent to (default: every connected relay) */
  readonly selectRelays?: RelaySelectionPolicy
  /** Key used to answer NIP-42 AUTH challenges; challenges are ignored without one */
  readonly authKey?: PrivateKey
}

/** Internal relay entry */
interface RelayEntry {
  readonly connection: RelayConnection
  readonly fiber: Fiber.RuntimeFiber<void>
}

// =============================================================================
// Service Interface
// =============================================================================

export interface RelayPool {
  readonly _tag: "RelayPool"

  /**
   * Add a relay and start connecting. Returns the normalised URL; adding a
   * relay that is already present does nothing.
   */
  addRelay(url: string): Effect.Effect<string, InvalidRelayUrl>

  /**
   * Remove a relay, closing its connection. Absent relays are ignored.
   */
  removeRelay(url: string): Effect.Effect<void, InvalidRelayUrl>

  /**
   * Get list of all relay URLs in the pool
   */
  getRelays(): Effect.Effect<ReadonlyArray<string>>

  getRelayStatus(url: string): Effect.Effect<RelaySnapshot | null, InvalidRelayUrl>

  /**
   * Get list of connected relay URLs
   */
  getConnectedRelays(): Effect.Effect<ReadonlyArray<string>>

  /**
   * Open a feed: stored matches first, then live events from the selected
   * relays, with one CaughtUp once they have all sent EOSE.
   */
  openSubscription(filters: ReadonlyArray<Filter>): Effect.Effect<SubscriptionHandle>

  closeSubscription(id: SubscriptionId): Effect.Effect<void>

  getSubscription(id: SubscriptionId): Effect.Effect<SubscriptionInfo, SubscriptionNotFound>

  /**
   * Send an event to every relay in the pool. Never fails; each relay's
   * outcome is in the report.
   */
  publish(event: NostrEvent): Effect.Effect<PublishReport>

  /**
   * Query the local store directly
   */
  queryLocal(filter: Filter): Stream.Stream<NostrEvent, StoreError>

  /**
   * A subscription to pool notices for the life of the caller's scope
   */
  readonly notices: Effect.Effect<Queue.Dequeue<PoolNotice>, never, Scope.Scope>

  /**
   * Close every subscription and connection. The pool stays usable.
   */
  close(): Effect.Effect<void>
}

// =============================================================================
// Service Tag
// =============================================================================

export const RelayPool = Context.GenericTag<RelayPool>("RelayPool")

// =============================================================================
// Service Implementation
// =============================================================================

const make = (options: RelayPoolOptions = {}) =>
  Effect.gen(function* () {
    const config = yield* EngineConfig
    const store = yield* NoteStore
    const scope = yield* Effect.scope
    // Connections are built on addRelay, long after the layer; they run on
    // the services the pool was built with.
    const services = yield* Effect.context<Transport | EventValidator | EventService | EngineConfig>()

    const notices = yield* PubSub.unbounded<PoolNotice>()
    const inbox = yield* Queue.bounded<ConnectionReport>(config.inboxCapacity)
    const membership = yield* Effect.makeSemaphore(1)
    const tracker = makePublishTracker()
    const relays = new Map<string, RelayEntry>()
    let connectionCount = 0

    const router = yield* makeSubscriptionRouter({
      notices,
      tracker,
      connections: () => Array.from(relays.values(), (entry) => entry.connection),
      selectRelays: options.selectRelays ?? allConnectedRelays,
    })

    yield* Effect.forkIn(router.dispatch(inbox), scope)
    yield* Effect.forkIn(router.pipeline.writer, scope)

    const detach = (url: string, entry: RelayEntry) =>
      Effect.gen(function* () {
        // Leave the directory first so queued reports from this connection
        // are discarded by the router.
        relays.delete(url)
        yield* router.relayRemoved(entry.connection.connectionId)
        yield* Fiber.interrupt(entry.fiber)
        yield* Effect.logInfo("Relay removed").pipe(Effect.annotateLogs({ relay: url }))
      })

    const addRelay: RelayPool["addRelay"] = (input) =>
      membership.withPermits(1)(
        Effect.gen(function* () {
          const url = yield* normalizeRelayUrl(input)
          if (relays.has(url)) return url

          connectionCount += 1
          const connection = yield* makeRelayConnection({
            url,
            connectionId: `${url}#${connectionCount}`,
            reports: inbox,
            notices,
            authKey: options.authKey,
          }).pipe(Effect.provide(services))

          // The actor waits until it is in the directory, so its first
          // reports are never mistaken for a removed connection's.
          const listed = yield* Deferred.make<void>()
          const fiber = yield* Effect.forkIn(
            Deferred.await(listed).pipe(Effect.zipRight(connection.run)),
            scope
          )
          relays.set(url, { connection, fiber })
          yield* Deferred.succeed(listed, undefined)

          yield* Effect.logInfo("Relay added").pipe(Effect.annotateLogs({ relay: url }))
          return url
        })
      )

    const removeRelay: RelayPool["removeRelay"] = (input) =>
      membership.withPermits(1)(
        Effect.gen(function* () {
          const url = yield* normalizeRelayUrl(input)
          const entry = relays.get(url)
          if (entry === undefined) return
          yield* detach(url, entry)
        })
      )

    const getRelays: RelayPool["getRelays"] = () => Effect.sync(() => Array.from(relays.keys()))

    const getRelayStatus: RelayPool["getRelayStatus"] = (input) =>
      Effect.gen(function* () {
        const url = yield* normalizeRelayUrl(input)
        const entry = relays.get(url)
        if (entry === undefined) return null
        return yield* entry.connection.snapshot
      })

    const getConnectedRelays: RelayPool["getConnectedRelays"] = () =>
      Effect.gen(function* () {
        const connected: string[] = []
        for (const [url, entry] of Array.from(relays)) {
          const state = yield* entry.connection.state
          if (state === "connected") {
            connected.push(url)
          }
        }
        return connected
      })

    const publishTo = (connection: RelayConnection, event: NostrEvent) =>
      Effect.gen(function* () {
        const message = ClientMessage.Event({ event })
        const state = yield* connection.state
        if (state !== "connected") {
          const outcome = yield* connection.send(message)
          return PublishOutcome.TransportFailed({
            reason: `Relay is ${state}`,
            queued: SendOutcome.$is("Buffered")(outcome),
          })
        }

        const answer = yield* tracker.expect(connection.connectionId, event.id)
        const outcome = yield* connection.send(message)
        if (!SendOutcome.$is("Sent")(outcome)) {
          yield* tracker.forget(connection.connectionId, event.id)
          return PublishOutcome.TransportFailed({
            reason: "Connection lost while sending",
            queued: SendOutcome.$is("Buffered")(outcome),
          })
        }
        yield* tracker.sentOn(connection.connectionId, event.id, outcome.session)

        const result = yield* Deferred.await(answer).pipe(
          Effect.timeoutOption(Duration.millis(config.publishTimeoutMs))
        )
        if (Option.isNone(result)) {
          yield* tracker.forget(connection.connectionId, event.id)
          return PublishOutcome.TimedOut()
        }
        return result.value
      })

    const publish: RelayPool["publish"] = (event) =>
      Effect.gen(function* () {
        const entries = Array.from(relays)
        const results = yield* Effect.forEach(
          entries,
          ([url, entry]) =>
            publishTo(entry.connection, event).pipe(Effect.map((outcome) => ({ url, outcome }))),
          { concurrency: "unbounded" }
        )
        yield* Effect.logDebug(`Published to ${results.length} relays`).pipe(
          Effect.annotateLogs({ eventId: event.id })
        )
        return { eventId: event.id, results }
      })

    const getSubscription: RelayPool["getSubscription"] = (id) =>
      router.describe(id).pipe(
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.fail(new SubscriptionNotFound({ subscriptionId: id })),
            onSome: Effect.succeed,
          })
        )
      )

    const close: RelayPool["close"] = () =>
      membership.withPermits(1)(
        Effect.gen(function* () {
          yield* router.shutdown
          for (const [url, entry] of Array.from(relays)) {
            yield* detach(url, entry)
          }
        })
      )

    yield* Effect.addFinalizer(() => close())

    return {
      _tag: "RelayPool" as const,
      addRelay,
      removeRelay,
      getRelays,
      getRelayStatus,
      getConnectedRelays,
      openSubscription: router.subscribe,
      closeSubscription: router.unsubscribe,
      getSubscription,
      publish,
      queryLocal: (filter: Filter) => store.query(filter),
      notices: PubSub.subscribe(notices),
      close,
    }
  })

// =============================================================================
// Layer Constructors
// =============================================================================

/**
 * RelayPool layer over caller-provided services. Closing the layer's scope
 * closes every connection.
 */
export const RelayPoolLive = (options: RelayPoolOptions = {}) => Layer.scoped(RelayPool, make(options))

/**
 * RelayPool with the engine's own configuration, crypto and validation
 * layers. Only a Transport and a NoteStore remain to be provided.
 */
export const makeRelayPoolLayer = (
  options: RelayPoolOptions & { readonly config?: EngineConfigInput } = {}
) =>
  RelayPoolLive(options).pipe(
    Layer.provide(EventValidatorLive),
    Layer.provide(EventServiceLive),
    Layer.provide(CryptoServiceLive),
    Layer.provide(EngineConfigLive(options.config))
  )
