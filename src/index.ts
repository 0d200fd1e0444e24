/**
 * animalia-etl: GBIF species data → canonical animal records → local API
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/fetcher/index.js";
export * from "./lib/transformer/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/sender/index.js";
export * from "./lib/orchestrator/index.js";
export * from "./lib/utils/http-client.js";
export * from "./lib/utils/rate-limiter.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export * from "./utils/staging.js";
