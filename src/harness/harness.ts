/**
 * Harness entry points
 *
 * executeAndReport: discover, run and judge every case under a data root.
 * diffOnly: compare two existing trees without running anything.
 */

import path from "node:path";
import { DEFAULT_PIPELINES, type Pipeline } from "../config/schema.js";
import type { Header } from "../artifacts/types.js";
import { parallel } from "../utils/async.js";
import { ConfigError, errorMessage } from "../utils/errors.js";
import { ensureDir, fileExists, listFiles } from "../utils/files.js";
import { createChildLogger, logTiming } from "../utils/logger.js";
import { RunAggregator } from "./aggregator.js";
import {
  buildCaseResult,
  compareArtifactSets,
  emptyComparison,
  filterBySuffix,
  type ArtifactSetComparison,
} from "./case-compare.js";
import { createRunContext, type RunContext } from "./context.js";
import {
  assertDiscoveryRoot,
  discoverCases,
  type PrimaryInputPredicate,
} from "./discoverer.js";
import { CASE_LOG_DIR, dispatch } from "./dispatcher.js";
import {
  DEFAULT_ARTIFACT_SUFFIXES,
  createExecutionJudge,
  createLiveComparator,
} from "./live-comparator.js";
import type { CommandRunner } from "./runner.js";
import { parseSelector, type Selector } from "./selector.js";
import { summarizeTrees } from "./tree-summary.js";
import type { CaseResult, RunReport } from "./types.js";

export interface ExecuteOptions {
  rootPath: string;
  /** Must not exist yet */
  outputPath: string;
  /** Directory holding the pipeline executables */
  execPath: string;
  concurrency: number;
  timeoutMs: number;
  graceMs?: number;
  /** Only inputs whose primary header matches are run */
  selector?: Selector | string;
  /** When set, every case's artifacts are compared against this tree as it completes */
  referencePath?: string;
  pipelines?: readonly Pipeline[];
  isPrimaryInput?: PrimaryInputPredicate;
  maxDepth?: number;
  artifactSuffixes?: readonly string[];
  signal?: AbortSignal;
  runner?: CommandRunner;
  readHeader?: (inputPath: string) => Promise<Header>;
}

export interface DiffOptions {
  artifactSuffixes?: readonly string[];
  /** Cases compared at once */
  concurrency?: number;
}

function linkSignal(context: RunContext, signal: AbortSignal | undefined): void {
  if (!signal) return;
  if (signal.aborted) {
    context.abort(signal.reason);
  } else {
    signal.addEventListener("abort", () => context.abort(signal.reason), { once: true });
  }
}

function failedResult(caseId: string, index: number, message: string): CaseResult {
  const comparison: ArtifactSetComparison = { ...emptyComparison(), errors: [message] };
  return buildCaseResult(caseId, index, undefined, comparison);
}

/**
 * Discover, execute and judge every case under a data root
 *
 * @throws DiscoveryError if the data root or reference tree is not a directory
 * @throws ConfigError if the output path already exists
 */
export async function executeAndReport(
  options: ExecuteOptions,
  context: RunContext = createRunContext(),
): Promise<RunReport> {
  const logger = context.logger;
  linkSignal(context, options.signal);

  await assertDiscoveryRoot(options.rootPath);
  if (options.referencePath !== undefined) {
    await assertDiscoveryRoot(options.referencePath, "Reference tree");
  }
  if (await fileExists(options.outputPath)) {
    throw new ConfigError(`Output path already exists: ${options.outputPath}`, {
      issues: [{ path: "outputPath", message: "must not exist" }],
    });
  }
  await ensureDir(path.join(options.outputPath, CASE_LOG_DIR));

  const selector =
    typeof options.selector === "string" ? parseSelector(options.selector) : options.selector;
  const cases = discoverCases(options.rootPath, {
    pipelines: options.pipelines ?? DEFAULT_PIPELINES,
    execPath: options.execPath,
    selector,
    isPrimaryInput: options.isPrimaryInput,
    maxDepth: options.maxDepth,
    readHeader: options.readHeader,
    logger: createChildLogger(logger, "discover"),
  });

  const judge =
    options.referencePath !== undefined
      ? createLiveComparator({
          outputRoot: options.outputPath,
          referenceRoot: options.referencePath,
          comparison: context.comparison,
          artifactSuffixes: options.artifactSuffixes,
          logger: createChildLogger(logger, "compare"),
        })
      : createExecutionJudge(createChildLogger(logger, "execute"));

  const aggregator = new RunAggregator(options.referencePath !== undefined ? "live" : "execute");
  const counted = async function* () {
    for await (const testCase of cases) {
      context.progress.discovered++;
      yield testCase;
    }
  };
  const completions = dispatch(counted(), {
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    graceMs: options.graceMs,
    outputRoot: options.outputPath,
    signal: context.signal,
    runner: options.runner,
    logger: createChildLogger(logger, "dispatch"),
    onStart: () => {
      context.progress.dispatched++;
    },
  });

  logger.info(`Running cases under ${options.rootPath} with ${options.concurrency} workers`);
  for await (const completion of completions) {
    context.progress.completed++;
    const { testCase, outcome } = completion;
    let result: CaseResult;
    try {
      result = await judge(completion);
    } catch (error) {
      result = buildCaseResult(testCase.id, testCase.index, outcome, {
        ...emptyComparison(),
        errors: [errorMessage(error)],
      });
    }
    aggregator.add(result);
  }

  const report = aggregator.finalize({ aborted: context.signal.aborted });
  const { pass, fail, error, total } = report.counts;
  logger.info(`${total} cases: ${pass} passed, ${fail} failed, ${error} errors`);
  return report;
}

/**
 * Compare a reference tree against a candidate tree. Every directory holding
 * artifact files on either side is one case, identified by its relative path.
 *
 * @throws DiscoveryError if either tree is not a directory
 */
export async function diffOnly(
  referencePath: string,
  candidatePath: string,
  options: DiffOptions = {},
  context: RunContext = createRunContext(),
): Promise<RunReport> {
  const logger = createChildLogger(context.logger, "diff");
  await assertDiscoveryRoot(referencePath, "Reference tree");
  await assertDiscoveryRoot(candidatePath, "Candidate tree");

  const [referenceFiles, candidateFiles] = await Promise.all([
    listFiles(referencePath),
    listFiles(candidatePath),
  ]);
  const suffixes = options.artifactSuffixes ?? DEFAULT_ARTIFACT_SUFFIXES;

  const groups = new Map<string, { reference: string[]; candidate: string[] }>();
  const group = (file: string) => {
    const dir = path.posix.dirname(file);
    let entry = groups.get(dir);
    if (!entry) {
      entry = { reference: [], candidate: [] };
      groups.set(dir, entry);
    }
    return entry;
  };
  for (const file of filterBySuffix(referenceFiles, suffixes)) group(file).reference.push(file);
  for (const file of filterBySuffix(candidateFiles, suffixes)) group(file).candidate.push(file);

  const caseIds = [...groups.keys()].sort();
  context.progress.discovered = caseIds.length;
  logger.info(`Comparing ${caseIds.length} directories`);

  const aggregator = new RunAggregator("diff");
  await parallel(
    caseIds,
    async (caseId, index) => {
      context.progress.dispatched++;
      const sets = groups.get(caseId) ?? { reference: [], candidate: [] };
      let result: CaseResult;
      try {
        const comparison = await compareArtifactSets(
          {
            referenceRoot: referencePath,
            candidateRoot: candidatePath,
            referenceFiles: sets.reference,
            candidateFiles: sets.candidate,
          },
          context.comparison,
        );
        result = buildCaseResult(caseId, index, undefined, comparison);
      } catch (error) {
        result = failedResult(caseId, index, errorMessage(error));
      }
      aggregator.add(result);
      context.progress.completed++;
      logger.debug(`${result.verdict.toUpperCase()} ${caseId}`);
    },
    options.concurrency ?? 4,
    context.signal,
  );

  const aborted = context.signal.aborted;
  caseIds.forEach((caseId, index) => {
    if (!aggregator.has(caseId)) {
      aggregator.add(failedResult(caseId, index, "Cancelled before comparison"));
    }
  });

  const tree = aborted
    ? undefined
    : await logTiming(logger, "tree summary", () =>
        summarizeTrees(referencePath, candidatePath, referenceFiles, candidateFiles),
      );
  return aggregator.finalize({ aborted, tree });
}
