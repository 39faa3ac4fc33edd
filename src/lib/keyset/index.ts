/**
 * Composite key set - duplicate detection over string tuples
 */

export { CompositeKeySet } from "./composite-key-set.js";
