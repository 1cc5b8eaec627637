/**
 * fits-regress: regression harness for FITS calibration pipelines
 *
 * Discovers test cases in a data tree, runs each one through its pipeline
 * executable with bounded concurrency and compares the artifacts produced
 * against a reference tree.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Harness
export * from "./harness/index.js";

// Artifact access
export * from "./artifacts/index.js";

// Comparison
export * from "./compare/index.js";

// Housekeeping
export * from "./housekeeping/index.js";

// Configuration
export * from "./config/index.js";

// Utilities
export * from "./utils/index.js";
