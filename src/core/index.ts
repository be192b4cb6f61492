/**
 * Core module - Shared functionality between the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./config.js";
export * from "./chunker/index.js";
export * from "./indexer/index.js";
export * from "./graph/index.js";
export * from "./graph-builder/index.js";
export * from "./llm/index.js";
export * from "./query/index.js";
export * from "./pipeline/index.js";

// Re-export types
export * from "../types/index.js";
export * from "../types/result.js";
