/**
 * Artifact access exports
 */

export * from "./types.js";
export { openArtifact, readPrimaryHeader, detectReader, DEFAULT_READERS } from "./registry.js";
export { fitsReader, parseFits } from "./fits/reader.js";
export { opaqueReader } from "./opaque.js";
export { encodeFits, writeFits } from "./fits/writer.js";
export type { UnitSpec, ImageSpec, TableSpec, ColumnSpec, CardValue } from "./fits/writer.js";
