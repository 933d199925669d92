/**
 * WebSocket transport backed by the `ws` package.
 *
 * Inbound frames wait in a queue until the connection's reader takes them.
 * Once `highWaterMark` frames are waiting the socket is paused, and it is
 * resumed when the reader has brought the backlog down to half of that.
 * A paused socket may still deliver what it had already read.
 */
import { Effect, Layer, Queue, Stream } from "effect"
import WebSocket from "ws"
import { TransportError } from "../core/Errors.js"
import { Transport, type TransportSession } from "./Transport.js"

const rawToText = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8")
  if (Buffer.isBuffer(data)) return data.toString("utf8")
  return Buffer.from(data).toString("utf8")
}

// ws emits "error" after terminate() on a half-open socket; an unheard
// "error" event would be thrown by the emitter.
const ignoreLateError = (_error: Error): void => undefined

type Inbound =
  | { readonly _tag: "Frame"; readonly text: string }
  | { readonly _tag: "Closed"; readonly error: TransportError }

export interface WebSocketTransportOptions {
  /** Waiting inbound frames at which the socket stops reading (default 1024) */
  readonly highWaterMark?: number
}

/** Read-side flow control for one socket */
interface Flow {
  readonly highWaterMark: number
  waiting: number
  paused: boolean
}

/**
 * Listeners go on in the same tick as "open", so nothing the relay sends
 * before the reader starts is lost.
 */
const listen = (url: string, socket: WebSocket, inbound: Queue.Enqueue<Inbound>, flow: Flow): void => {
  const close = (message: string) =>
    inbound.unsafeOffer({ _tag: "Closed", error: new TransportError({ message, url, reason: "closed" }) })

  socket.on("message", (data) => {
    inbound.unsafeOffer({ _tag: "Frame", text: rawToText(data) })
    flow.waiting += 1
    if (!flow.paused && flow.waiting >= flow.highWaterMark) {
      flow.paused = true
      socket.pause()
    }
  })
  socket.on("error", (error) => close(error.message))
  socket.on("close", (code, reason) =>
    close(`Socket closed (${code}${reason.length > 0 ? `: ${reason.toString("utf8")}` : ""})`)
  )
}

const openSocket = (
  url: string,
  inbound: Queue.Enqueue<Inbound>,
  flow: Flow
): Effect.Effect<WebSocket, TransportError> =>
  Effect.async<WebSocket, TransportError>((resume) => {
    let socket: WebSocket
    try {
      socket = new WebSocket(url)
    } catch (error) {
      resume(
        Effect.fail(
          new TransportError({
            message: error instanceof Error ? error.message : "Connection failed",
            url,
            reason: "connect",
          })
        )
      )
      return
    }

    const onOpen = () => {
      socket.off("error", onError)
      listen(url, socket, inbound, flow)
      resume(Effect.succeed(socket))
    }
    const onError = (error: Error) => {
      socket.off("open", onOpen)
      resume(Effect.fail(new TransportError({ message: error.message, url, reason: "connect" })))
    }
    socket.once("open", onOpen)
    socket.once("error", onError)

    // Interrupted before the handshake finished (e.g. connect timeout)
    return Effect.sync(() => {
      socket.off("open", onOpen)
      socket.off("error", onError)
      socket.on("error", ignoreLateError)
      socket.terminate()
    })
  })

const consumed = (socket: WebSocket, flow: Flow) =>
  Effect.sync(() => {
    flow.waiting -= 1
    if (flow.paused && flow.waiting <= Math.floor(flow.highWaterMark / 2)) {
      flow.paused = false
      socket.resume()
    }
  })

const makeSession = (
  url: string,
  socket: WebSocket,
  inbound: Queue.Dequeue<Inbound>,
  flow: Flow
): TransportSession => ({
  url,

  frames: Stream.fromQueue(inbound).pipe(
    Stream.takeUntil((item) => item._tag === "Closed"),
    Stream.mapEffect((item): Effect.Effect<string, TransportError> =>
      item._tag === "Frame" ? Effect.as(consumed(socket, flow), item.text) : Effect.fail(item.error)
    )
  ),

  send: (frame) =>
    Effect.async<void, TransportError>((resume) => {
      if (socket.readyState !== WebSocket.OPEN) {
        resume(Effect.fail(new TransportError({ message: "Socket is not open", url, reason: "send" })))
        return
      }
      socket.send(frame, (error) => {
        if (error) {
          resume(Effect.fail(new TransportError({ message: error.message, url, reason: "send" })))
        } else {
          resume(Effect.void)
        }
      })
    }),
})

export const makeWebSocketTransport = (options: WebSocketTransportOptions = {}) =>
  Layer.succeed(Transport, {
    _tag: "Transport",

    open: (url) =>
      Effect.gen(function* () {
        const flow: Flow = { highWaterMark: options.highWaterMark ?? 1024, waiting: 0, paused: false }
        const inbound = yield* Queue.unbounded<Inbound>()
        const socket = yield* Effect.acquireRelease(openSocket(url, inbound, flow), (socket) =>
          Effect.sync(() => {
            socket.removeAllListeners()
            socket.on("error", ignoreLateError)
            socket.terminate()
          })
        )
        return makeSession(url, socket, inbound, flow)
      }),
  })

export const WebSocketTransportLive = makeWebSocketTransport()
