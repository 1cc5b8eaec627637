/**
 * Harness exports
 */

export * from "./types.js";
export { executeAndReport, diffOnly, type ExecuteOptions, type DiffOptions } from "./harness.js";
export { createRunContext, type RunContext, type RunContextOptions, type RunProgress } from "./context.js";
export {
  discoverCases,
  walkPrimaryInputs,
  suffixPredicate,
  assertDiscoveryRoot,
  DEFAULT_MAX_DEPTH,
  type DiscoveryOptions,
  type PrimaryInputPredicate,
} from "./discoverer.js";
export {
  dispatch,
  runCase,
  caseOutputDir,
  caseLogFile,
  type CaseCompletion,
  type DispatchOptions,
} from "./dispatcher.js";
export { execaRunner, type CommandRunner, type RunRequest, type RunResult } from "./runner.js";
export {
  createLiveComparator,
  createExecutionJudge,
  DEFAULT_ARTIFACT_SUFFIXES,
  type CaseJudge,
  type LiveComparatorOptions,
} from "./live-comparator.js";
export { compareArtifactSets, deriveVerdict, filterBySuffix } from "./case-compare.js";
export { RunAggregator, isCleanRun } from "./aggregator.js";
export { summarizeTrees } from "./tree-summary.js";
export { formatRunReport, formatCounts } from "./report.js";
export {
  parseSelector,
  selectorFromArgs,
  matchesSelector,
  formatSelector,
  type Selector,
  type SelectorTerm,
} from "./selector.js";
