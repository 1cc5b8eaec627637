/**
 * Artifact comparator
 *
 * Pairs the structural units of two artifacts by identifier and diffs their
 * header metadata and data. Both files are opened read-only.
 */

import { openArtifact } from "../artifacts/registry.js";
import type { ArtifactHandle, ArtifactUnit } from "../artifacts/types.js";
import { compareUnitData } from "./data.js";
import { compareHeaders, keywordMatcher } from "./metadata.js";
import {
  DEFAULT_COMPARISON,
  isUnitDiffEmpty,
  type ArtifactDiff,
  type ArtifactVerdict,
  type ComparisonOptions,
  type UnitDiff,
} from "./types.js";

/**
 * Diff two already-opened artifacts
 */
export function diffArtifacts(
  reference: ArtifactHandle,
  candidate: ArtifactHandle,
  options: Partial<ComparisonOptions> = {},
): ArtifactDiff {
  const opts = { ...DEFAULT_COMPARISON, ...options };
  const base = {
    referencePath: reference.path,
    candidatePath: candidate.path,
    referenceKind: reference.kind,
    candidateKind: candidate.kind,
  };

  if (reference.kind !== candidate.kind) {
    return { ...base, units: [], verdict: "structurally-incompatible" };
  }

  const ignore = keywordMatcher(opts.ignoreKeywords);
  const candidateUnits = new Map<string, ArtifactUnit>(candidate.units.map((u) => [u.id, u]));
  const units: UnitDiff[] = [];

  for (const refUnit of reference.units) {
    const candUnit = candidateUnits.get(refUnit.id);
    if (!candUnit) {
      units.push({ unitId: refUnit.id, status: "removed", metadata: [], data: null });
      continue;
    }
    candidateUnits.delete(refUnit.id);
    units.push({
      unitId: refUnit.id,
      status: "common",
      metadata: compareHeaders(refUnit.header, candUnit.header, ignore),
      data: compareUnitData(refUnit, candUnit, opts.tolerance),
    });
  }

  for (const candUnit of candidateUnits.values()) {
    units.push({ unitId: candUnit.id, status: "added", metadata: [], data: null });
  }

  const verdict: ArtifactVerdict = units.every(isUnitDiffEmpty) ? "identical" : "differing";
  return { ...base, units, verdict };
}

/**
 * Open and diff two artifact files
 *
 * @throws UnreadableArtifactError if either file cannot be opened or parsed
 */
export async function compareArtifacts(
  referencePath: string,
  candidatePath: string,
  options: Partial<ComparisonOptions> = {},
): Promise<ArtifactDiff> {
  const [reference, candidate] = await Promise.all([
    openArtifact(referencePath, options.readers),
    openArtifact(candidatePath, options.readers),
  ]);
  return diffArtifacts(reference, candidate, options);
}
