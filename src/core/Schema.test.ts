import { describe, expect, test } from "vitest"
import { Schema } from "@effect/schema"
import { EventId, EventKind, Filter, NostrEvent, SubscriptionId, isTagQueryKey } from "./Schema.js"

describe("Schema", () => {
  describe("EventId", () => {
    test("accepts valid 64-char hex", () => {
      expect(Schema.decodeUnknownSync(EventId)("a".repeat(64))).toBe("a".repeat(64))
    })

    test("rejects uppercase hex", () => {
      expect(() => Schema.decodeUnknownSync(EventId)("A".repeat(64))).toThrow()
    })

    test("rejects wrong length", () => {
      expect(() => Schema.decodeUnknownSync(EventId)("a".repeat(63))).toThrow()
    })
  })

  describe("EventKind", () => {
    test("accepts the full range", () => {
      expect(Schema.decodeUnknownSync(EventKind)(0)).toBe(0)
      expect(Schema.decodeUnknownSync(EventKind)(65535)).toBe(65535)
    })

    test("rejects out of range and fractional kinds", () => {
      expect(() => Schema.decodeUnknownSync(EventKind)(-1)).toThrow()
      expect(() => Schema.decodeUnknownSync(EventKind)(65536)).toThrow()
      expect(() => Schema.decodeUnknownSync(EventKind)(1.5)).toThrow()
    })
  })

  describe("SubscriptionId", () => {
    test("accepts 1 to 64 characters", () => {
      expect(Schema.decodeUnknownSync(SubscriptionId)("s")).toBe("s")
      expect(Schema.decodeUnknownSync(SubscriptionId)("x".repeat(64))).toHaveLength(64)
    })

    test("rejects empty and overlong ids", () => {
      expect(() => Schema.decodeUnknownSync(SubscriptionId)("")).toThrow()
      expect(() => Schema.decodeUnknownSync(SubscriptionId)("x".repeat(65))).toThrow()
    })
  })

  describe("Filter", () => {
    test("keeps tag queries", () => {
      const filter = Schema.decodeUnknownSync(Filter)({ kinds: [1], "#t": ["nostr"], "#p": ["b".repeat(64)] })
      expect(filter).toEqual({ kinds: [1], "#t": ["nostr"], "#p": ["b".repeat(64)] })
    })

    test("rejects tag queries that are not string lists", () => {
      expect(() => Schema.decodeUnknownSync(Filter)({ "#t": "nostr" })).toThrow()
    })

    test("rejects negative limits", () => {
      expect(() => Schema.decodeUnknownSync(Filter)({ limit: -1 })).toThrow()
    })
  })

  describe("NostrEvent", () => {
    test("rejects a short signature", () => {
      const event = {
        id: "a".repeat(64),
        pubkey: "b".repeat(64),
        created_at: 1,
        kind: 1,
        tags: [],
        content: "",
        sig: "c".repeat(64),
      }
      expect(() => Schema.decodeUnknownSync(NostrEvent)(event)).toThrow()
      expect(Schema.decodeUnknownSync(NostrEvent)({ ...event, sig: "c".repeat(128) }).sig).toHaveLength(128)
    })
  })

  test("isTagQueryKey", () => {
    expect(isTagQueryKey("#e")).toBe(true)
    expect(isTagQueryKey("#")).toBe(false)
    expect(isTagQueryKey("kinds")).toBe(false)
  })
})
