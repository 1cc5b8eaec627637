/**
 * Byte-level statistics over two whole trees
 */

import path from "node:path";
import { filesEqual } from "../utils/files.js";
import { parallel } from "../utils/async.js";
import type { SuffixCounts, TreeSummary } from "./types.js";

const NO_SUFFIX = "(none)";

export function suffixOf(file: string): string {
  return path.posix.extname(file) || NO_SUFFIX;
}

function countBySuffix(files: readonly string[]): SuffixCounts {
  const bySuffix: Record<string, number> = {};
  for (const file of files) {
    const suffix = suffixOf(file);
    bySuffix[suffix] = (bySuffix[suffix] ?? 0) + 1;
  }
  return { total: files.length, bySuffix };
}

/**
 * Count byte-differing files and files present on one side only,
 * given each tree's file list as POSIX paths relative to its root
 */
export async function summarizeTrees(
  referenceRoot: string,
  candidateRoot: string,
  referenceFiles: readonly string[],
  candidateFiles: readonly string[],
  concurrency: number = 8,
): Promise<TreeSummary> {
  const candidates = new Set(candidateFiles);
  const references = new Set(referenceFiles);
  const common = referenceFiles.filter((file) => candidates.has(file));

  const equal = await parallel(
    common,
    (file) =>
      filesEqual(
        path.join(referenceRoot, ...file.split("/")),
        path.join(candidateRoot, ...file.split("/")),
      ),
    concurrency,
  );

  return {
    differing: countBySuffix(common.filter((_, i) => equal[i] === false)),
    referenceOnly: countBySuffix(referenceFiles.filter((file) => !candidates.has(file))),
    candidateOnly: countBySuffix(candidateFiles.filter((file) => !references.has(file))),
  };
}
