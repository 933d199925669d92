/**
 * NoteStore
 *
 * The local event database the engine persists into and seeds feeds from.
 * The on-disk engine lives outside this package; `MemoryNoteStoreLive` keeps
 * everything in process.
 */
import { Context, Effect, Layer, Ref, Stream } from "effect"
import type { StoreError } from "../core/Errors.js"
import { matchesFilter } from "../core/FilterMatcher.js"
import type { Filter, NostrEvent } from "../core/Schema.js"

// =============================================================================
// Service Interface
// =============================================================================

export interface NoteStore {
  readonly _tag: "NoteStore"

  /**
   * Persist an event. Storing an id that is already present is a no-op.
   */
  put(event: NostrEvent): Effect.Effect<void, StoreError>

  /**
   * Stored events matching `filter`, newest first, at most `filter.limit`.
   * The stream is lazy and can be run again for a fresh result.
   */
  query(filter: Filter): Stream.Stream<NostrEvent, StoreError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const NoteStore = Context.GenericTag<NoteStore>("NoteStore")

// =============================================================================
// In-Memory Implementation
// =============================================================================

const newestFirst = (a: NostrEvent, b: NostrEvent): number =>
  b.created_at - a.created_at || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)

export const makeMemoryNoteStore = (eventsRef: Ref.Ref<ReadonlyMap<string, NostrEvent>>): NoteStore => ({
  _tag: "NoteStore",

  put: (event) =>
    Ref.update(eventsRef, (events) => {
      if (events.has(event.id)) return events
      const updated = new Map(events)
      updated.set(event.id, event)
      return updated
    }),

  query: (filter) =>
    Stream.unwrap(
      Ref.get(eventsRef).pipe(
        Effect.map((events) => {
          const matching = Array.from(events.values())
            .filter((event) => matchesFilter(event, filter))
            .sort(newestFirst)
          const limited = filter.limit === undefined ? matching : matching.slice(0, filter.limit)
          return Stream.fromIterable(limited)
        })
      )
    ),
})

export const MemoryNoteStoreLive = Layer.effect(
  NoteStore,
  Ref.make<ReadonlyMap<string, NostrEvent>>(new Map()).pipe(Effect.map(makeMemoryNoteStore))
)
