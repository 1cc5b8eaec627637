/**
 * Structured diff between a reference artifact and a candidate artifact
 */

import type { ArtifactReader, MetadataValue } from "../artifacts/types.js";

/**
 * Numeric tolerance. Two finite numbers are equal when
 * |reference - candidate| <= absolute + relative * |reference|.
 */
export interface Tolerance {
  absolute: number;
  relative: number;
}

export const EXACT: Tolerance = { absolute: 0, relative: 0 };

export interface ComparisonOptions {
  tolerance: Tolerance;
  /** Header keywords skipped when comparing metadata; `*` matches any run of characters */
  ignoreKeywords: string[];
  readers?: readonly ArtifactReader[];
}

export const DEFAULT_COMPARISON: ComparisonOptions = {
  tolerance: EXACT,
  ignoreKeywords: ["DATE"],
};

export type MetadataOperation = "added" | "removed" | "changed";

export interface MetadataDiffEntry {
  keyword: string;
  operation: MetadataOperation;
  oldValue?: MetadataValue;
  newValue?: MetadataValue;
}

export interface ValueDiffSummary {
  /** Elements compared */
  total: number;
  differing: number;
  /** Largest |reference - candidate| among finite differing elements */
  maxAbsolute: number;
  /** Largest |reference - candidate| / |reference| among finite differing elements with a non-zero reference */
  maxRelative: number;
}

export type DataDiff =
  | {
      kind: "shape-mismatch";
      referenceShape: string;
      candidateShape: string;
    }
  | ({
      kind: "values";
      /** Per-column breakdown for tables, differing columns only */
      columns?: Record<string, ValueDiffSummary>;
    } & ValueDiffSummary);

export type UnitStatus = "common" | "added" | "removed";

export interface UnitDiff {
  unitId: string;
  /** added: candidate only; removed: reference only */
  status: UnitStatus;
  metadata: MetadataDiffEntry[];
  /** null when the data agrees (or the unit exists on one side only) */
  data: DataDiff | null;
}

export type ArtifactVerdict = "identical" | "differing" | "structurally-incompatible";

export interface ArtifactDiff {
  referencePath: string;
  candidatePath: string;
  referenceKind: string;
  candidateKind: string;
  /** One entry per unit present in either file */
  units: UnitDiff[];
  verdict: ArtifactVerdict;
}

export function isUnitDiffEmpty(diff: UnitDiff): boolean {
  return diff.status === "common" && diff.metadata.length === 0 && diff.data === null;
}
