/**
 * Text rendering of artifact diffs
 */

import { formatMetadataValue } from "../artifacts/types.js";
import type { ArtifactDiff, DataDiff, UnitDiff } from "./types.js";
import { isUnitDiffEmpty } from "./types.js";

function formatData(data: DataDiff): string {
  if (data.kind === "shape-mismatch") {
    return `shape mismatch: ${data.referenceShape} → ${data.candidateShape}`;
  }
  const parts = [
    `${data.differing}/${data.total} elements differ`,
    `max abs ${data.maxAbsolute.toPrecision(6)}`,
    `max rel ${data.maxRelative.toPrecision(6)}`,
  ];
  const columns = Object.keys(data.columns ?? {});
  if (columns.length > 0) {
    parts.push(`columns ${columns.join(", ")}`);
  }
  return parts.join("; ");
}

function formatUnit(unit: UnitDiff): string[] {
  if (unit.status === "added") return [`+ ${unit.unitId} (candidate only)`];
  if (unit.status === "removed") return [`- ${unit.unitId} (reference only)`];

  const lines = [`~ ${unit.unitId}`];
  for (const entry of unit.metadata) {
    switch (entry.operation) {
      case "added":
        lines.push(`    + ${entry.keyword}: ${formatMetadataValue(entry.newValue)}`);
        break;
      case "removed":
        lines.push(`    - ${entry.keyword}: ${formatMetadataValue(entry.oldValue)}`);
        break;
      case "changed":
        lines.push(
          `    ~ ${entry.keyword}: ${formatMetadataValue(entry.oldValue)} → ${formatMetadataValue(entry.newValue)}`,
        );
        break;
    }
  }
  if (unit.data) {
    lines.push(`    data: ${formatData(unit.data)}`);
  }
  return lines;
}

/**
 * Format an artifact diff as lines of text
 *
 * @example
 * // "ref/a_flt.fits" vs "out/a_flt.fits": differing
 * // ~ SCI,1
 * //     ~ EXPTIME: 100 → 101
 * //     data: 3/1024 elements differ; max abs 0.500000; max rel 0.0100000
 */
export function formatArtifactDiff(diff: ArtifactDiff): string {
  const lines = [`"${diff.referencePath}" vs "${diff.candidatePath}": ${diff.verdict}`];

  if (diff.verdict === "structurally-incompatible") {
    lines.push(`  kinds differ: ${diff.referenceKind} → ${diff.candidateKind}`);
    return lines.join("\n");
  }

  for (const unit of diff.units) {
    if (isUnitDiffEmpty(unit)) continue;
    lines.push(...formatUnit(unit).map((line) => `  ${line}`));
  }
  return lines.join("\n");
}
