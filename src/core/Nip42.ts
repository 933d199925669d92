/**
 * NIP-42: Authentication of clients to relays
 * https://github.com/nostr-protocol/nips/blob/master/42.md
 */
import { AUTH_EVENT_KIND, type Tag } from "./Schema.js"

/** Fields of the kind 22242 event answering a relay challenge */
export interface AuthTemplate {
  readonly kind: number
  readonly tags: ReadonlyArray<Tag>
  readonly content: string
}

export const makeAuthTemplate = (relayUrl: string, challenge: string): AuthTemplate => ({
  kind: AUTH_EVENT_KIND,
  tags: [
    ["relay", relayUrl],
    ["challenge", challenge],
  ],
  content: "",
})
