/**
 * @ocfg/core
 * Core types, schemas, registries and utilities for the OpenCode config manager
 */

// Types
export * from "./types.js";

// Schemas
export * from "./schema.js";

// Errors
export * from "./errors.js";

// Utilities
export * from "./utils.js";

// Logger
export { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";

// Provider registry, presets and known paths
export * from "./registry/index.js";
