/**
 * relay-ingest
 *
 * Relay connection pool and event ingestion for Nostr clients, built with
 * Effect.
 */

// Core schemas, codec and configuration
export * from "./core/index.js"

// Services
export * from "./services/CryptoService.js"
export * from "./services/EventService.js"
export * from "./services/EventValidator.js"

// Client
export * from "./client/index.js"
