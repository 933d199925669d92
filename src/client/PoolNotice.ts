/**
 * Pool notices
 *
 * Observable engine state published on the pool's notice hub. Nothing here is
 * an error a caller must handle; these are the signals a UI or a supervisor
 * watches.
 */
import { Data } from "effect"

export type ConnectionState = "disconnected" | "connecting" | "connected" | "failed"

export type PoolNotice = Data.TaggedEnum<{
  RelayStateChanged: {
    readonly relay: string
    readonly state: ConnectionState
    readonly reason: string | undefined
  }
  /** A relay NOTICE message */
  RelayNotice: { readonly relay: string; readonly message: string }
  /** The outbound buffer of a disconnected relay was full; its oldest frame was dropped */
  OutboundOverflow: { readonly relay: string; readonly dropped: string }
  /** The store queue is full; ingestion waits for the store writer */
  IngestBackpressure: { readonly queued: number }
  /** An event could not be persisted after all retries */
  StoreDegraded: { readonly eventId: string; readonly message: string }
}>

export const PoolNotice = Data.taggedEnum<PoolNotice>()
