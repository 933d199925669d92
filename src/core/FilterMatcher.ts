/**
 * FilterMatcher
 *
 * NIP-01 filter matching: AND across the fields of one filter, OR across
 * the filters of a subscription.
 */
import { isTagQueryKey, type Filter, type NostrEvent } from "./Schema.js"

/**
 * Check if an event matches a single filter.
 * A field that is present but empty matches nothing.
 */
export const matchesFilter = (event: NostrEvent, filter: Filter): boolean => {
  if (filter.ids !== undefined && !filter.ids.includes(event.id)) return false
  if (filter.authors !== undefined && !filter.authors.includes(event.pubkey)) return false
  if (filter.kinds !== undefined && !filter.kinds.includes(event.kind)) return false
  if (filter.since !== undefined && event.created_at < filter.since) return false
  if (filter.until !== undefined && event.created_at > filter.until) return false

  for (const key of Object.keys(filter)) {
    if (!isTagQueryKey(key)) continue
    const wanted = filter[key]
    if (wanted === undefined) continue
    const name = key.slice(1)
    const present = event.tags.some(
      (tag) => tag[0] === name && tag[1] !== undefined && wanted.includes(tag[1])
    )
    if (!present) return false
  }

  return true
}

/**
 * Check if an event matches any of the filters
 */
export const matchesFilters = (event: NostrEvent, filters: ReadonlyArray<Filter>): boolean =>
  filters.some((filter) => matchesFilter(event, filter))
