/**
 * Relay URL normalisation, shared by the pool and the selection policies
 */
import { Either } from "effect"
import { InvalidRelayUrl } from "../core/Errors.js"

const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i

/**
 * Normalise a relay URL: `wss://` is assumed without a scheme, the host is
 * lowercased and a bare trailing slash is removed. Only ws: and wss: pass.
 */
export const normalizeRelayUrl = (input: string): Either.Either<string, InvalidRelayUrl> => {
  const trimmed = input.trim()
  const candidate = hasScheme.test(trimmed) ? trimmed : `wss://${trimmed}`

  let parsed: URL
  try {
    parsed = new URL(candidate)
  } catch {
    return Either.left(new InvalidRelayUrl({ message: "Not a valid URL", url: input }))
  }
  if (parsed.protocol !== "ws:" && parsed.protocol !== "wss:") {
    return Either.left(
      new InvalidRelayUrl({ message: `Unsupported scheme ${parsed.protocol}`, url: input })
    )
  }
  if (parsed.hostname === "") {
    return Either.left(new InvalidRelayUrl({ message: "Relay URL has no host", url: input }))
  }

  const text = parsed.toString()
  const bare = parsed.pathname === "/" && parsed.search === "" && parsed.hash === ""
  return Either.right(bare ? text.slice(0, -1) : text)
}
