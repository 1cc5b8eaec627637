/**
 * Live comparison: diff each case's artifacts against the reference tree as
 * soon as the case finishes, without waiting for the rest of the run.
 */

import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import type { ComparisonOptions } from "../compare/types.js";
import { listFiles, toPosix } from "../utils/files.js";
import { createSilentLogger } from "../utils/logger.js";
import {
  buildCaseResult,
  compareArtifactSets,
  emptyComparison,
  filterBySuffix,
} from "./case-compare.js";
import type { CaseCompletion } from "./dispatcher.js";
import type { CaseResult } from "./types.js";

export interface LiveComparatorOptions {
  outputRoot: string;
  /** Tree laid out like the output root, holding the expected artifacts */
  referenceRoot: string;
  comparison: Partial<ComparisonOptions>;
  artifactSuffixes?: readonly string[];
  logger?: Logger<ILogObj>;
}

export type CaseJudge = (completion: CaseCompletion) => Promise<CaseResult>;

export const DEFAULT_ARTIFACT_SUFFIXES: readonly string[] = [".fits"];

function logVerdict(logger: Logger<ILogObj>, result: CaseResult): void {
  const message = `${result.verdict.toUpperCase()} ${result.caseId}`;
  if (result.verdict === "pass") {
    logger.info(message);
  } else {
    logger.warn(message);
  }
}

export function createLiveComparator(options: LiveComparatorOptions): CaseJudge {
  const logger = options.logger ?? createSilentLogger();
  const suffixes = options.artifactSuffixes ?? DEFAULT_ARTIFACT_SUFFIXES;

  return async ({ testCase, outcome }) => {
    let result: CaseResult;
    if (outcome.status !== "success") {
      result = buildCaseResult(testCase.id, testCase.index, outcome, emptyComparison());
    } else {
      const caseDir = toPosix(path.relative(options.outputRoot, outcome.outputDir));
      const referenceFiles = (
        await listFiles(path.join(options.referenceRoot, ...caseDir.split("/")))
      ).map((file) => path.posix.join(caseDir, file));

      const comparison = await compareArtifactSets(
        {
          referenceRoot: options.referenceRoot,
          candidateRoot: options.outputRoot,
          referenceFiles: filterBySuffix(referenceFiles, suffixes),
          candidateFiles: filterBySuffix(outcome.artifacts, suffixes),
        },
        options.comparison,
      );
      result = buildCaseResult(testCase.id, testCase.index, outcome, comparison);
    }

    logVerdict(logger, result);
    return result;
  };
}

/**
 * Judge a case on its execution alone: it passes iff it ran successfully
 */
export function createExecutionJudge(logger: Logger<ILogObj> = createSilentLogger()): CaseJudge {
  return async ({ testCase, outcome }) => {
    const result = buildCaseResult(testCase.id, testCase.index, outcome, emptyComparison());
    logVerdict(logger, result);
    return result;
  };
}
