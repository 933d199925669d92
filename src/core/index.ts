/**
 * Core types, wire codec and configuration
 */
export * from "./Schema.js"
export * from "./Errors.js"
export * from "./Codec.js"
export * from "./Config.js"
export * from "./FilterMatcher.js"
export * as Nip42 from "./Nip42.js"
