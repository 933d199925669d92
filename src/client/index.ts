/**
 * Client exports
 */
export * from "./Transport.js"
export * from "./WebSocketTransport.js"
export * from "./PoolNotice.js"
export * from "./RelayConnection.js"
export * from "./RelaySelection.js"
export * from "./RelayUrl.js"
export * from "./PublishTracker.js"
export * from "./IngestionPipeline.js"
export * from "./SubscriptionRouter.js"
export * from "./NoteStore.js"
export * from "./RelayPool.js"
export { backoffDelay, canRetry } from "./Backoff.js"
