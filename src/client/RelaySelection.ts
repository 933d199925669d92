/**
 * Relay selection policies
 *
 * Decide which connections a subscription is sent to. The router asks the
 * policy when a subscription opens and again whenever a connection comes up.
 */
import { Either } from "effect"
import type { Filter } from "../core/Schema.js"
import type { RelaySnapshot } from "./RelayConnection.js"
import { normalizeRelayUrl } from "./RelayUrl.js"

export type RelaySelectionPolicy = (
  candidates: ReadonlyArray<RelaySnapshot>,
  filters: ReadonlyArray<Filter>
) => ReadonlyArray<RelaySnapshot>

/** Every connected relay */
export const allConnectedRelays: RelaySelectionPolicy = (candidates) =>
  candidates.filter((relay) => relay.state === "connected")

/**
 * Connected relays whose URL is in `urls`, e.g. the outbox relays of the
 * authors a feed follows. URLs are normalised; invalid ones match nothing.
 */
export const onlyRelays =
  (urls: Iterable<string>): RelaySelectionPolicy =>
  (candidates) => {
    const allowed = new Set<string>()
    for (const url of urls) {
      const normalized = normalizeRelayUrl(url)
      if (Either.isRight(normalized)) allowed.add(normalized.right)
    }
    return candidates.filter((relay) => relay.state === "connected" && allowed.has(relay.url))
  }
