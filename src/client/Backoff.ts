/**
 * Reconnection backoff: exponential growth capped at `maxDelayMs`, with the
 * top `jitterRatio` of each delay randomised so relays that dropped together
 * do not reconnect together.
 */
import type { BackoffConfig } from "../core/Config.js"

/**
 * Delay before reconnect attempt number `retry` (0-based).
 * `random` is a sample in [0, 1).
 */
export const backoffDelay = (policy: BackoffConfig, retry: number, random: number): number => {
  const exponential = policy.initialDelayMs * Math.pow(policy.multiplier, retry)
  const capped = Math.min(exponential, policy.maxDelayMs)
  const factor = 1 - policy.jitterRatio + random * policy.jitterRatio
  return Math.round(capped * factor)
}

/**
 * Whether another attempt is allowed after `failures` consecutive failures
 */
export const canRetry = (policy: BackoffConfig, failures: number): boolean =>
  failures < policy.maxAttempts
