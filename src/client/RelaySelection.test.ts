import { describe, expect, test } from "vitest"
import type { ConnectionState } from "./PoolNotice.js"
import type { RelaySnapshot } from "./RelayConnection.js"
import { allConnectedRelays, onlyRelays } from "./RelaySelection.js"

const snapshot = (url: string, state: ConnectionState): RelaySnapshot => ({
  url,
  connectionId: `${url}#1`,
  state,
  retryCount: 0,
  lastFailure: undefined,
  lastError: undefined,
  activeSubscriptions: [],
  pendingWrites: 0,
})

const candidates = [
  snapshot("wss://relay-a.test", "connected"),
  snapshot("wss://relay-b.test", "connected"),
  snapshot("wss://relay-c.test", "disconnected"),
]

describe("allConnectedRelays", () => {
  test("keeps connected relays only", () => {
    expect(allConnectedRelays(candidates, []).map((relay) => relay.url)).toEqual([
      "wss://relay-a.test",
      "wss://relay-b.test",
    ])
  })
})

describe("onlyRelays", () => {
  test("matches URLs written the way the pool would not store them", () => {
    const policy = onlyRelays(["RELAY-B.test/", "wss://relay-c.test"])
    expect(policy(candidates, []).map((relay) => relay.url)).toEqual(["wss://relay-b.test"])
  })

  test("ignores URLs that cannot name a relay", () => {
    const policy = onlyRelays(["https://relay-a.test", "not a relay"])
    expect(policy(candidates, [])).toEqual([])
  })
})
