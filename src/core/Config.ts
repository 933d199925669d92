/**
 * Engine configuration
 *
 * Every field has a default, so `EngineConfigLive({})` yields a working
 * configuration and callers only spell out what they change.
 */
import { Schema } from "@effect/schema"
import { Context, Layer } from "effect"

const PositiveInt = Schema.Number.pipe(Schema.int(), Schema.positive())
const NonNegativeInt = Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0))

/** Reconnection backoff policy */
export const BackoffConfig = Schema.Struct({
  initialDelayMs: Schema.optionalWith(PositiveInt, { default: () => 1000 }),
  maxDelayMs: Schema.optionalWith(PositiveInt, { default: () => 30000 }),
  multiplier: Schema.optionalWith(Schema.Number.pipe(Schema.greaterThanOrEqualTo(1)), {
    default: () => 2,
  }),
  /** Fraction of the delay that is randomised away (0 disables jitter) */
  jitterRatio: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 1)), {
    default: () => 0.3,
  }),
  /** Consecutive failures before the connection is marked failed */
  maxAttempts: Schema.optionalWith(PositiveInt, { default: () => 10 }),
})
export type BackoffConfig = typeof BackoffConfig.Type

export const EngineConfigSchema = Schema.Struct({
  connectTimeoutMs: Schema.optionalWith(PositiveInt, { default: () => 10000 }),
  reconnect: Schema.optionalWith(BackoffConfig, {
    default: () => Schema.decodeSync(BackoffConfig)({}),
  }),
  outboundBufferSize: Schema.optionalWith(PositiveInt, { default: () => 256 }),
  inboxCapacity: Schema.optionalWith(PositiveInt, { default: () => 1024 }),
  storeQueueCapacity: Schema.optionalWith(PositiveInt, { default: () => 1024 }),
  storeMaxRetries: Schema.optionalWith(NonNegativeInt, { default: () => 3 }),
  storeRetryDelayMs: Schema.optionalWith(NonNegativeInt, { default: () => 250 }),
  dedupCapacity: Schema.optionalWith(PositiveInt, { default: () => 10000 }),
  maxFutureSkewSeconds: Schema.optionalWith(NonNegativeInt, { default: () => 900 }),
  publishTimeoutMs: Schema.optionalWith(PositiveInt, { default: () => 10000 }),
  /** Seed new subscriptions from the local store */
  coldStart: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  /** Raise `since` to the newest seen event when re-sending REQ after a reconnect */
  sinceOptimize: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  /** Die on internal invariant violations instead of logging them */
  strictInvariants: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  subscriptionIdPrefix: Schema.optionalWith(
    Schema.String.pipe(Schema.minLength(1), Schema.maxLength(32)),
    { default: () => "sub" }
  ),
})

export type EngineConfig = typeof EngineConfigSchema.Type
export type EngineConfigInput = typeof EngineConfigSchema.Encoded

export const EngineConfig = Context.GenericTag<EngineConfig>("EngineConfig")

export const decodeEngineConfig = Schema.decodeUnknownSync(EngineConfigSchema)

/**
 * Build the configuration layer. Invalid input is a defect: configuration is
 * fixed by the host application, not by the network.
 */
export const EngineConfigLive = (input: EngineConfigInput = {}): Layer.Layer<EngineConfig> =>
  Layer.sync(EngineConfig, () => decodeEngineConfig(input))
