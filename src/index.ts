/**
 * tablelint: relational integrity constraints for tabular data in delimited files
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/column/index.js";
export * from "./lib/values/index.js";
export * from "./lib/keyset/index.js";
export * from "./lib/consistency/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/source/index.js";
export * from "./lib/schema-loader/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
