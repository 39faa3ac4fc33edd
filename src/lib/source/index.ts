/**
 * Row sources - CSV directories and in-memory tables
 */

export * from "./types.js";
export { CsvDirectorySource } from "./csv-source.js";
export { InMemoryRowSource } from "./memory-source.js";
