/**
 * Harness data model: test cases, execution outcomes, case results and run reports
 */

import type { ArtifactDiff } from "../compare/types.js";

/**
 * Command line of a case: executable plus arguments (the input path is the last argument)
 */
export interface CaseCommand {
  executable: string;
  args: string[];
  /** Name of the configured pipeline that produced this command */
  pipeline: string;
}

/**
 * One discovered test case. Frozen once discovered.
 */
export interface TestCase {
  /** POSIX path of the primary input relative to the data root */
  readonly id: string;
  /** Position in discovery order */
  readonly index: number;
  readonly inputPath: string;
  readonly inputDir: string;
  readonly command: Readonly<CaseCommand>;
  /** Primary header values looked at while selecting and resolving the case */
  readonly tags: Readonly<Record<string, string | number | boolean>>;
}

export type ExecutionStatus = "success" | "non-zero" | "timeout" | "launch-failure" | "cancelled";

export interface ExecutionOutcome {
  caseId: string;
  status: ExecutionStatus;
  exitCode: number | null;
  /** Last lines of stderr */
  stderrTail: string;
  durationMs: number;
  /** Working directory the case ran in */
  outputDir: string;
  /** Files left in outputDir, POSIX paths relative to the output root */
  artifacts: string[];
  logFile?: string;
  /** Launch or termination details */
  error?: string;
}

export type CaseVerdict = "pass" | "fail" | "error";

export interface CaseResult {
  caseId: string;
  /** Discovery index; orders the report */
  index: number;
  /** Absent in diff-only mode */
  outcome?: ExecutionOutcome;
  diffs: ArtifactDiff[];
  /** Reference artifacts with no candidate counterpart (relative paths) */
  missingArtifacts: string[];
  /** Candidate artifacts with no reference counterpart (relative paths) */
  unexpectedArtifacts: string[];
  /** Unreadable artifacts and other per-case failures */
  errors: string[];
  verdict: CaseVerdict;
}

export interface RunCounts {
  pass: number;
  fail: number;
  error: number;
  total: number;
}

export type RunMode = "execute" | "live" | "diff";

/**
 * Byte-level statistics over two whole trees, broken down by suffix
 */
export interface TreeSummary {
  differing: SuffixCounts;
  referenceOnly: SuffixCounts;
  candidateOnly: SuffixCounts;
}

export interface SuffixCounts {
  total: number;
  bySuffix: Record<string, number>;
}

export interface RunReport {
  mode: RunMode;
  /** Ordered by discovery */
  cases: CaseResult[];
  counts: RunCounts;
  /** True when the run was cancelled before every case completed */
  aborted: boolean;
  startedAt: string;
  durationMs: number;
  tree?: TreeSummary;
}
