// Core re-exports for the pipeline type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/fetcher/types.js";
export * from "../lib/transformer/types.js";
export * from "../lib/validator/types.js";
export * from "../lib/sender/types.js";
export * from "../lib/orchestrator/types.js";
