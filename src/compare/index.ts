/**
 * Artifact comparison exports
 */

export * from "./types.js";
export { compareArtifacts, diffArtifacts } from "./comparator.js";
export { compareHeaders, keywordMatcher, metadataEqual } from "./metadata.js";
export {
  compareIntegers,
  compareNumbers,
  compareStrings,
  compareUnitData,
  describeShape,
} from "./data.js";
export { formatArtifactDiff } from "./format.js";
