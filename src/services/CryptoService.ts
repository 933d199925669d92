/**
 * CryptoService
 *
 * sha256 digests and BIP-340 schnorr signatures over secp256k1.
 * Uses @noble/curves and @noble/hashes.
 */
import { Context, Effect, Layer } from "effect"
import { schnorr } from "@noble/curves/secp256k1"
import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex, hexToBytes } from "@noble/hashes/utils"
import { CryptoError, InvalidPrivateKey } from "../core/Errors.js"
import type { EventId, PrivateKey, PublicKey, Signature } from "../core/Schema.js"

// =============================================================================
// Service Interface
// =============================================================================

export interface CryptoService {
  readonly _tag: "CryptoService"

  generatePrivateKey(): Effect.Effect<PrivateKey, CryptoError>

  getPublicKey(privateKey: PrivateKey): Effect.Effect<PublicKey, InvalidPrivateKey>

  /**
   * Digest of a UTF-8 string, as an event id
   */
  hash(message: string): Effect.Effect<EventId, CryptoError>

  /**
   * Schnorr-sign a 32-byte event id
   */
  sign(id: EventId, privateKey: PrivateKey): Effect.Effect<Signature, CryptoError>

  /**
   * Verify a schnorr signature over an event id. Undecodable signatures or
   * keys verify as false rather than failing.
   */
  verify(signature: string, id: string, publicKey: string): Effect.Effect<boolean>
}

// =============================================================================
// Service Tag
// =============================================================================

export const CryptoService = Context.GenericTag<CryptoService>("CryptoService")

// =============================================================================
// Service Implementation
// =============================================================================

const encoder = new TextEncoder()

const make: CryptoService = {
  _tag: "CryptoService",

  generatePrivateKey: () =>
    Effect.try({
      try: (): PrivateKey => bytesToHex(schnorr.utils.randomPrivateKey()) as PrivateKey,
      catch: (error) =>
        new CryptoError({
          message: `Failed to generate private key: ${String(error)}`,
          operation: "generateKey",
        }),
    }),

  getPublicKey: (privateKey) =>
    Effect.try({
      try: (): PublicKey => bytesToHex(schnorr.getPublicKey(hexToBytes(privateKey))) as PublicKey,
      catch: (error) =>
        new InvalidPrivateKey({ message: `Failed to derive public key: ${String(error)}` }),
    }),

  hash: (message) =>
    Effect.try({
      try: (): EventId => bytesToHex(sha256(encoder.encode(message))) as EventId,
      catch: (error) =>
        new CryptoError({ message: `Failed to hash message: ${String(error)}`, operation: "hash" }),
    }),

  sign: (id, privateKey) =>
    Effect.try({
      try: (): Signature => bytesToHex(schnorr.sign(hexToBytes(id), hexToBytes(privateKey))) as Signature,
      catch: (error) =>
        new CryptoError({ message: `Failed to sign event id: ${String(error)}`, operation: "sign" }),
    }),

  verify: (signature, id, publicKey) =>
    Effect.sync(() => {
      try {
        return schnorr.verify(hexToBytes(signature), hexToBytes(id), hexToBytes(publicKey))
      } catch {
        return false
      }
    }),
}

// =============================================================================
// Service Layer
// =============================================================================

export const CryptoServiceLive = Layer.succeed(CryptoService, make)
