/**
 * Transport
 *
 * One bidirectional message stream per relay URL. The connection actor owns
 * the session for as long as its scope is open.
 */
import { Context, type Effect, type Scope, type Stream } from "effect"
import type { TransportError } from "../core/Errors.js"

export interface TransportSession {
  readonly url: string

  /**
   * Text frames from the relay. Ends, or fails, when the session closes.
   */
  readonly frames: Stream.Stream<string, TransportError>

  send(frame: string): Effect.Effect<void, TransportError>
}

export interface Transport {
  readonly _tag: "Transport"

  /**
   * Open a session. Completes once the handshake is done; closing the scope
   * closes the session.
   */
  open(url: string): Effect.Effect<TransportSession, TransportError, Scope.Scope>
}

export const Transport = Context.GenericTag<Transport>("Transport")
