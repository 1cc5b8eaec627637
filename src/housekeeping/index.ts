export { cleanTree, moveTree, DEFAULT_KEEP, RESULTS_DIR, type HousekeepingOptions } from "./tree.js";
export { findInputs, type FindOptions } from "./find.js";
