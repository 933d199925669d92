/**
 * Dedup cache
 *
 * Bounded set of recently seen event ids. Holds only the id, never the event.
 * When full, the least recently seen id is evicted; an evicted event that
 * arrives again is processed again, which the store tolerates.
 */

export interface DedupCache {
  /**
   * Record `id`. Returns true if it was not already present.
   */
  markSeen(id: string): boolean

  has(id: string): boolean

  readonly size: number
}

export const makeDedupCache = (capacity: number): DedupCache => {
  // Map iteration order is insertion order: the first key is the oldest.
  const seen = new Map<string, true>()

  return {
    markSeen: (id) => {
      if (seen.has(id)) {
        seen.delete(id)
        seen.set(id, true)
        return false
      }
      seen.set(id, true)
      if (seen.size > capacity) {
        const oldest = seen.keys().next()
        if (oldest.done !== true) seen.delete(oldest.value)
      }
      return true
    },

    has: (id) => seen.has(id),

    get size() {
      return seen.size
    },
  }
}
