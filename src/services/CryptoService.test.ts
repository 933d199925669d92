import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { CryptoService, CryptoServiceLive } from "./CryptoService.js"
import { PrivateKey } from "../core/Schema.js"

const runWithCrypto = <A, E>(effect: Effect.Effect<A, E, CryptoService>): Promise<A> =>
  Effect.runPromise(Effect.provide(effect, CryptoServiceLive))

const ONE = PrivateKey.make("0".repeat(63) + "1")

describe("CryptoService", () => {
  test("derives the x-only public key", async () => {
    const publicKey = await runWithCrypto(Effect.flatMap(CryptoService, (crypto) => crypto.getPublicKey(ONE)))
    expect(publicKey).toBe("79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798")
  })

  test("rejects the zero key", async () => {
    const error = await runWithCrypto(
      Effect.flatMap(CryptoService, (crypto) => crypto.getPublicKey(PrivateKey.make("0".repeat(64)))).pipe(
        Effect.flip
      )
    )
    expect(error._tag).toBe("InvalidPrivateKey")
  })

  test("hashes UTF-8 with sha256", async () => {
    const digest = await runWithCrypto(Effect.flatMap(CryptoService, (crypto) => crypto.hash("")))
    expect(digest).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855")
  })

  test("signatures verify against the signer only", async () => {
    const result = await runWithCrypto(
      Effect.gen(function* () {
        const crypto = yield* CryptoService
        const privateKey = yield* crypto.generatePrivateKey()
        const otherKey = yield* crypto.generatePrivateKey()
        const publicKey = yield* crypto.getPublicKey(privateKey)
        const otherPublicKey = yield* crypto.getPublicKey(otherKey)
        const id = yield* crypto.hash("message")
        const signature = yield* crypto.sign(id, privateKey)

        return {
          length: signature.length,
          valid: yield* crypto.verify(signature, id, publicKey),
          wrongKey: yield* crypto.verify(signature, id, otherPublicKey),
          wrongId: yield* crypto.verify(signature, yield* crypto.hash("other"), publicKey),
        }
      })
    )
    expect(result).toEqual({ length: 128, valid: true, wrongKey: false, wrongId: false })
  })

  test("undecodable input verifies as false", async () => {
    const verified = await runWithCrypto(
      Effect.flatMap(CryptoService, (crypto) => crypto.verify("zz", "a".repeat(64), "b".repeat(64)))
    )
    expect(verified).toBe(false)
  })
})
