/**
 * IngestionPipeline
 *
 * Takes validated events from every relay and fans each out to the matching
 * subscriptions that have not had it yet. Events new to the pipeline are
 * handed to a background store writer through a bounded queue; repeats are
 * not stored again.
 */
import { Data, Duration, Effect, PubSub, Queue, Schedule } from "effect"
import { EngineConfig } from "../core/Config.js"
import { matchesFilters } from "../core/FilterMatcher.js"
import type { Filter, NostrEvent, SubscriptionId } from "../core/Schema.js"
import { makeDedupCache, type DedupCache } from "./DedupCache.js"
import { NoteStore } from "./NoteStore.js"
import { PoolNotice } from "./PoolNotice.js"

// =============================================================================
// Types
// =============================================================================

/** Source of events replayed from the local store */
export const LOCAL_SOURCE = "local"

/** What a subscription feed carries */
export type FeedItem = Data.TaggedEnum<{
  /** `source` is the relay URL the event first arrived from, or "local" */
  Event: { readonly event: NostrEvent; readonly source: string }
  /** Every targeted relay has sent EOSE */
  CaughtUp: {}
  /** A relay closed the subscription or failed for good */
  RelayClosed: { readonly relay: string; readonly reason: string }
}>
export const FeedItem = Data.taggedEnum<FeedItem>()

/** A live subscription as the pipeline sees it */
export interface FeedTarget {
  readonly id: SubscriptionId
  readonly filters: ReadonlyArray<Filter>
  readonly feed: Queue.Enqueue<FeedItem>
  /** Ids already put on this feed */
  readonly delivered: DedupCache
}

export interface IngestionPipeline {
  /**
   * Process one validated event. Returns false when the pipeline had
   * already seen it; it still reaches subscriptions that have not.
   */
  accept(event: NostrEvent, source: string): Effect.Effect<boolean>

  /**
   * Mark an id as seen without forwarding or storing it (cold-start results)
   */
  markSeen(id: string): void

  /**
   * Persist queued events until interrupted
   */
  readonly writer: Effect.Effect<never>
}

export interface IngestionPipelineParams {
  readonly notices: PubSub.PubSub<PoolNotice>
  /** Live subscriptions at the moment of the call */
  readonly targets: () => Iterable<FeedTarget>
}

// =============================================================================
// Implementation
// =============================================================================

export const makeIngestionPipeline = ({ notices, targets }: IngestionPipelineParams) =>
  Effect.gen(function* () {
    const store = yield* NoteStore
    const config = yield* EngineConfig
    const dedup = makeDedupCache(config.dedupCapacity)
    const storeQueue = yield* Queue.bounded<NostrEvent>(config.storeQueueCapacity)

    const accept: IngestionPipeline["accept"] = (event, source) =>
      Effect.gen(function* () {
        const fresh = dedup.markSeen(event.id)

        for (const target of targets()) {
          if (matchesFilters(event, target.filters) && target.delivered.markSeen(event.id)) {
            yield* Queue.offer(target.feed, FeedItem.Event({ event, source }))
          }
        }
        if (!fresh) return false

        if (yield* Queue.isFull(storeQueue)) {
          const queued = yield* Queue.size(storeQueue)
          yield* Effect.logWarning("Store queue full, ingestion waiting").pipe(
            Effect.annotateLogs({ eventId: event.id })
          )
          yield* PubSub.publish(notices, PoolNotice.IngestBackpressure({ queued }))
        }
        yield* Queue.offer(storeQueue, event)
        return true
      })

    const persist = (event: NostrEvent) =>
      store.put(event).pipe(
        Effect.retry(
          Schedule.spaced(Duration.millis(config.storeRetryDelayMs)).pipe(
            Schedule.intersect(Schedule.recurs(config.storeMaxRetries))
          )
        ),
        Effect.catchAll((error) =>
          Effect.logWarning(`Store degraded: ${error.message}`).pipe(
            Effect.annotateLogs({ eventId: event.id }),
            Effect.zipRight(
              PubSub.publish(notices, PoolNotice.StoreDegraded({ eventId: event.id, message: error.message }))
            )
          )
        )
      )

    const writer: IngestionPipeline["writer"] = Queue.take(storeQueue).pipe(
      Effect.flatMap(persist),
      Effect.forever
    )

    const pipeline: IngestionPipeline = {
      accept,
      markSeen: (id) => {
        dedup.markSeen(id)
      },
      writer,
    }
    return pipeline
  })
