import { describe, expect, test } from "vitest"
import { backoffDelay, canRetry } from "./Backoff.js"
import type { BackoffConfig } from "../core/Config.js"

const policy: BackoffConfig = {
  initialDelayMs: 100,
  maxDelayMs: 1000,
  multiplier: 2,
  jitterRatio: 0.5,
  maxAttempts: 3,
}

describe("Backoff", () => {
  test("grows exponentially up to the cap", () => {
    expect(backoffDelay(policy, 0, 1)).toBe(100)
    expect(backoffDelay(policy, 1, 1)).toBe(200)
    expect(backoffDelay(policy, 3, 1)).toBe(800)
    expect(backoffDelay(policy, 4, 1)).toBe(1000)
    expect(backoffDelay(policy, 20, 1)).toBe(1000)
  })

  test("jitter scales the delay into [1 - jitterRatio, 1]", () => {
    expect(backoffDelay(policy, 0, 0)).toBe(50)
    expect(backoffDelay(policy, 2, 0.5)).toBe(300)
    expect(backoffDelay(policy, 20, 0)).toBe(500)
  })

  test("no jitter gives the exact delay", () => {
    expect(backoffDelay({ ...policy, jitterRatio: 0 }, 2, 0.123)).toBe(400)
  })

  test("retries stop after maxAttempts consecutive failures", () => {
    expect(canRetry(policy, 2)).toBe(true)
    expect(canRetry(policy, 3)).toBe(false)
  })
})
