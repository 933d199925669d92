/**
 * Shared test services and event factories
 */
import { Effect, Layer } from "effect"
import { EngineConfigLive, type EngineConfigInput } from "../core/Config.js"
import { PrivateKey, TEXT_NOTE_KIND, type Tag } from "../core/Schema.js"
import { CryptoServiceLive } from "../services/CryptoService.js"
import { EventService, EventServiceLive } from "../services/EventService.js"
import { EventValidatorLive } from "../services/EventValidator.js"

export const TEST_KEY = PrivateKey.make("5".repeat(64))
export const OTHER_KEY = PrivateKey.make("6".repeat(64))

/** 2023-11-14T22:13:20Z */
export const BASE_TIME = 1_700_000_000

/**
 * Crypto, event, validator and configuration layers
 */
export const testServices = (config: EngineConfigInput = {}) => {
  const Config = EngineConfigLive(config)
  const Events = EventServiceLive.pipe(Layer.provide(CryptoServiceLive))
  const Validator = EventValidatorLive.pipe(
    Layer.provide(Layer.mergeAll(CryptoServiceLive, Events, Config))
  )
  return Layer.mergeAll(CryptoServiceLive, Events, Validator, Config)
}

export interface NoteOptions {
  readonly created_at?: number
  readonly kind?: number
  readonly tags?: ReadonlyArray<Tag>
  readonly key?: PrivateKey
}

/**
 * A signed event; text note by TEST_KEY at BASE_TIME unless overridden
 */
export const makeNote = (content: string, options: NoteOptions = {}) =>
  EventService.pipe(
    Effect.flatMap((events) =>
      events.createEvent(
        {
          kind: options.kind ?? TEXT_NOTE_KIND,
          content,
          tags: options.tags ?? [],
          created_at: options.created_at ?? BASE_TIME,
        },
        options.key ?? TEST_KEY
      )
    ),
    Effect.orDie
  )
