import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { matchesFilter, matchesFilters } from "./FilterMatcher.js"
import { BASE_TIME, OTHER_KEY, makeNote, testServices } from "../testing/fixtures.js"

const [note, other] = Effect.runSync(
  Effect.all([
    makeNote("tagged", {
      tags: [
        ["t", "nostr"],
        ["p", "c".repeat(64)],
        ["r"],
      ],
    }),
    makeNote("reaction", { kind: 7, key: OTHER_KEY, created_at: BASE_TIME + 100 }),
  ]).pipe(Effect.provide(testServices()))
)

describe("FilterMatcher", () => {
  test("empty filter matches everything", () => {
    expect(matchesFilter(note, {})).toBe(true)
  })

  test("matches ids, authors and kinds", () => {
    expect(matchesFilter(note, { ids: [note.id] })).toBe(true)
    expect(matchesFilter(note, { ids: [other.id] })).toBe(false)
    expect(matchesFilter(note, { authors: [note.pubkey] })).toBe(true)
    expect(matchesFilter(note, { authors: [other.pubkey] })).toBe(false)
    expect(matchesFilter(note, { kinds: [1, 7] })).toBe(true)
    expect(matchesFilter(note, { kinds: [7] })).toBe(false)
  })

  test("present but empty lists match nothing", () => {
    expect(matchesFilter(note, { ids: [] })).toBe(false)
    expect(matchesFilter(note, { kinds: [] })).toBe(false)
    expect(matchesFilter(note, { "#t": [] })).toBe(false)
  })

  test("since and until are inclusive", () => {
    expect(matchesFilter(note, { since: BASE_TIME })).toBe(true)
    expect(matchesFilter(note, { since: BASE_TIME + 1 })).toBe(false)
    expect(matchesFilter(note, { until: BASE_TIME })).toBe(true)
    expect(matchesFilter(note, { until: BASE_TIME - 1 })).toBe(false)
  })

  test("tag queries match the first value of tags with that name", () => {
    expect(matchesFilter(note, { "#t": ["bitcoin", "nostr"] })).toBe(true)
    expect(matchesFilter(note, { "#p": ["c".repeat(64)] })).toBe(true)
    expect(matchesFilter(note, { "#t": ["bitcoin"] })).toBe(false)
    expect(matchesFilter(note, { "#e": ["a".repeat(64)] })).toBe(false)
  })

  test("a tag without a value never matches", () => {
    expect(matchesFilter(note, { "#r": [""] })).toBe(false)
  })

  test("fields within a filter are ANDed", () => {
    expect(matchesFilter(note, { kinds: [1], "#t": ["nostr"] })).toBe(true)
    expect(matchesFilter(note, { kinds: [1], "#t": ["bitcoin"] })).toBe(false)
  })

  test("filters in a list are ORed", () => {
    expect(matchesFilters(other, [{ kinds: [1] }, { authors: [other.pubkey] }])).toBe(true)
    expect(matchesFilters(other, [{ kinds: [1] }, { since: BASE_TIME + 101 }])).toBe(false)
    expect(matchesFilters(note, [])).toBe(false)
  })
})
