/**
 * Comparison of one case's artifact set against its reference set
 */

import path from "node:path";
import { compareArtifacts } from "../compare/comparator.js";
import type { ArtifactDiff, ComparisonOptions } from "../compare/types.js";
import { errorMessage } from "../utils/errors.js";
import type { CaseResult, CaseVerdict, ExecutionOutcome } from "./types.js";

export interface ArtifactSets {
  referenceRoot: string;
  candidateRoot: string;
  /** POSIX paths relative to referenceRoot */
  referenceFiles: readonly string[];
  /** POSIX paths relative to candidateRoot */
  candidateFiles: readonly string[];
}

export interface ArtifactSetComparison {
  diffs: ArtifactDiff[];
  missingArtifacts: string[];
  unexpectedArtifacts: string[];
  errors: string[];
}

/**
 * Keep paths whose name ends with one of the suffixes
 */
export function filterBySuffix(files: readonly string[], suffixes: readonly string[]): string[] {
  return files.filter((file) => suffixes.some((suffix) => file.endsWith(suffix)));
}

function resolve(root: string, relative: string): string {
  return path.join(root, ...relative.split("/"));
}

/**
 * Pair artifacts by relative path and diff every pair
 */
export async function compareArtifactSets(
  sets: ArtifactSets,
  comparison: Partial<ComparisonOptions>,
): Promise<ArtifactSetComparison> {
  const candidates = new Set(sets.candidateFiles);
  const references = new Set(sets.referenceFiles);
  const result: ArtifactSetComparison = {
    diffs: [],
    missingArtifacts: [],
    unexpectedArtifacts: [],
    errors: [],
  };

  const paired: string[] = [];
  for (const file of [...references].sort()) {
    if (candidates.has(file)) {
      paired.push(file);
    } else {
      result.missingArtifacts.push(file);
    }
  }
  for (const file of [...candidates].sort()) {
    if (!references.has(file)) result.unexpectedArtifacts.push(file);
  }

  const diffs = await Promise.all(
    paired.map(async (file) => {
      try {
        return await compareArtifacts(
          resolve(sets.referenceRoot, file),
          resolve(sets.candidateRoot, file),
          comparison,
        );
      } catch (error) {
        result.errors.push(`${file}: ${errorMessage(error)}`);
        return null;
      }
    }),
  );
  result.diffs = diffs.filter((diff): diff is ArtifactDiff => diff !== null);
  result.errors.sort();
  return result;
}

/**
 * Verdict of a case from its outcome and comparison.
 * Execution failures, missing and unreadable artifacts are errors;
 * differing or unexpected artifacts are failures.
 */
export function deriveVerdict(
  outcome: ExecutionOutcome | undefined,
  comparison: ArtifactSetComparison,
): CaseVerdict {
  if (outcome && outcome.status !== "success") return "error";
  if (comparison.missingArtifacts.length > 0 || comparison.errors.length > 0) return "error";
  if (
    comparison.unexpectedArtifacts.length > 0 ||
    comparison.diffs.some((diff) => diff.verdict !== "identical")
  ) {
    return "fail";
  }
  return "pass";
}

export function buildCaseResult(
  caseId: string,
  index: number,
  outcome: ExecutionOutcome | undefined,
  comparison: ArtifactSetComparison,
): CaseResult {
  const result: CaseResult = {
    caseId,
    index,
    ...comparison,
    verdict: deriveVerdict(outcome, comparison),
  };
  if (outcome) result.outcome = outcome;
  return result;
}

export function emptyComparison(): ArtifactSetComparison {
  return { diffs: [], missingArtifacts: [], unexpectedArtifacts: [], errors: [] };
}
