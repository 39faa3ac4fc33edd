// Core re-exports for the tablelint type system

export * from "./schema.js";
