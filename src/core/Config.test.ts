import { describe, expect, test } from "vitest"
import { decodeEngineConfig } from "./Config.js"

describe("EngineConfig", () => {
  test("fills every default from empty input", () => {
    const config = decodeEngineConfig({})
    expect(config.connectTimeoutMs).toBe(10000)
    expect(config.outboundBufferSize).toBe(256)
    expect(config.dedupCapacity).toBe(10000)
    expect(config.maxFutureSkewSeconds).toBe(900)
    expect(config.subscriptionIdPrefix).toBe("sub")
    expect(config.coldStart).toBe(true)
    expect(config.strictInvariants).toBe(false)
    expect(config.reconnect).toEqual({
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      multiplier: 2,
      jitterRatio: 0.3,
      maxAttempts: 10,
    })
  })

  test("fills defaults inside a partial reconnect policy", () => {
    const config = decodeEngineConfig({ reconnect: { maxAttempts: 2 } })
    expect(config.reconnect.maxAttempts).toBe(2)
    expect(config.reconnect.initialDelayMs).toBe(1000)
  })

  test("rejects invalid values", () => {
    expect(() => decodeEngineConfig({ outboundBufferSize: 0 })).toThrow()
    expect(() => decodeEngineConfig({ reconnect: { jitterRatio: 1.5 } })).toThrow()
    expect(() => decodeEngineConfig({ subscriptionIdPrefix: "" })).toThrow()
  })
})
