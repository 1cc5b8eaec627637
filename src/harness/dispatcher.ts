/**
 * Execution dispatcher
 *
 * A fixed pool of workers pulls cases from a shared, possibly lazy, case
 * sequence, runs each one in its own output directory and emits outcomes
 * through a bounded channel as they complete.
 */

import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import { createChannel } from "../utils/async.js";
import { ValidationError, errorMessage } from "../utils/errors.js";
import { ensureDir, listFiles, toPosix } from "../utils/files.js";
import { createSilentLogger } from "../utils/logger.js";
import { execaRunner, type CommandRunner, type RunResult } from "./runner.js";
import type { ExecutionOutcome, ExecutionStatus, TestCase } from "./types.js";

export interface CaseCompletion {
  testCase: TestCase;
  outcome: ExecutionOutcome;
}

export interface DispatchOptions {
  /** Number of cases run at once; an integer of at least 1 */
  concurrency: number;
  timeoutMs: number;
  outputRoot: string;
  /** Time between SIGTERM and SIGKILL when a child is stopped */
  graceMs?: number;
  signal?: AbortSignal;
  runner?: CommandRunner;
  logger?: Logger<ILogObj>;
  /** Called when a worker starts a case */
  onStart?: (testCase: TestCase) => void;
  /** Called once per case as soon as its outcome is known */
  onOutcome?: (completion: CaseCompletion) => void;
}

export const DEFAULT_GRACE_MS = 5_000;

/** Subdirectory of the output root holding per-case logs */
export const CASE_LOG_DIR = "logs";

const STDERR_TAIL_LINES = 20;
const STDERR_TAIL_CHARS = 4_000;

/** Appended to an input's file name to form its working directory */
export const CASE_DIR_SUFFIX = ".d";

/**
 * Working directory of a case: `<outputRoot>/<case id>.d`, so
 * `set/j1_raw.fits` runs in `<outputRoot>/set/j1_raw.fits.d`
 */
export function caseOutputDir(outputRoot: string, testCase: TestCase): string {
  return path.join(outputRoot, ...testCase.id.split("/")) + CASE_DIR_SUFFIX;
}

/**
 * Log file of a case: `<outputRoot>/logs/<case id>.log`
 */
export function caseLogFile(outputRoot: string, testCase: TestCase): string {
  return path.join(outputRoot, CASE_LOG_DIR, ...testCase.id.split("/")) + ".log";
}

/**
 * Paths handed out to cases under one output root. A path may not equal,
 * contain or lie inside a path already claimed by another case.
 */
export class OutputClaims {
  private readonly claimed = new Set<string>();
  /** Every ancestor, below the root, of a claimed path */
  private readonly ancestors = new Set<string>();

  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private *parentsOf(target: string): Generator<string> {
    for (
      let dir = path.dirname(target);
      dir !== this.root && dir.startsWith(this.root + path.sep);
      dir = path.dirname(dir)
    ) {
      yield dir;
    }
  }

  /**
   * Claim a path for one case
   *
   * @returns Why the path cannot be used, or undefined once it is claimed
   */
  claim(target: string): string | undefined {
    const resolved = path.resolve(target);
    if (this.claimed.has(resolved)) {
      return `${resolved} is already used by another case`;
    }
    if (this.ancestors.has(resolved)) {
      return `${resolved} would contain the output of another case`;
    }
    for (const dir of this.parentsOf(resolved)) {
      if (this.claimed.has(dir)) {
        return `${resolved} lies inside ${dir}, used by another case`;
      }
    }
    this.claimed.add(resolved);
    for (const dir of this.parentsOf(resolved)) {
      this.ancestors.add(dir);
    }
    return undefined;
  }
}

export function tail(text: string): string {
  const lines = text.trimEnd().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
  return lines.length > STDERR_TAIL_CHARS ? lines.slice(-STDERR_TAIL_CHARS) : lines;
}

async function checkExecutable(executable: string): Promise<string | null> {
  try {
    const stat = await fs.stat(executable);
    if (!stat.isFile()) return `Not a file: ${executable}`;
    await fs.access(executable, fsConstants.X_OK);
    return null;
  } catch (error) {
    return `Cannot execute ${executable}: ${errorMessage(error)}`;
  }
}

function formatCaseLog(
  testCase: TestCase,
  version: string | null,
  result: Pick<RunResult, "exitCode" | "stdout" | "stderr">,
  error: string | undefined,
): string {
  const lines = [
    `input: ${testCase.inputPath}`,
    `program: ${testCase.command.executable} ${[...testCase.command.args, testCase.inputPath].join(" ")}`,
    `version: ${version ?? "unknown"}`,
    `return code: ${result.exitCode ?? "none"}`,
  ];
  if (error) lines.push(`error: ${error}`);
  lines.push("", "stdout:", result.stdout, "", "stderr:", result.stderr, "");
  return lines.join("\n");
}

function statusOf(result: RunResult, timedOut: boolean, cancelled: boolean): ExecutionStatus {
  if (result.launchError !== undefined) return "launch-failure";
  if (timedOut) return "timeout";
  if (cancelled && result.terminated) return "cancelled";
  return result.exitCode === 0 ? "success" : "non-zero";
}

export interface CaseRunDeps {
  outputRoot: string;
  claims: OutputClaims;
  timeoutMs: number;
  graceMs: number;
  signal: AbortSignal;
  runner: CommandRunner;
  logger: Logger<ILogObj>;
  version: (executable: string) => Promise<string | null>;
}

/**
 * Run one case to completion. Never rejects: every failure becomes an outcome.
 * The case's paths are claimed before the first await, so cases started in
 * order claim in order.
 */
export async function runCase(testCase: TestCase, deps: CaseRunDeps): Promise<ExecutionOutcome> {
  const start = performance.now();
  const outputDir = caseOutputDir(deps.outputRoot, testCase);
  const logFile = caseLogFile(deps.outputRoot, testCase);
  const { executable, args } = testCase.command;

  const outcome = (
    status: ExecutionStatus,
    result: Pick<RunResult, "exitCode" | "stderr">,
    artifacts: string[],
    error?: string,
  ): ExecutionOutcome => ({
    caseId: testCase.id,
    status,
    exitCode: result.exitCode,
    stderrTail: tail(result.stderr),
    durationMs: performance.now() - start,
    outputDir,
    artifacts,
    logFile,
    error,
  });

  const conflict = deps.claims.claim(outputDir) ?? deps.claims.claim(logFile);
  if (conflict !== undefined) {
    const error = `Refusing to run: ${conflict}`;
    deps.logger.error(`${testCase.id}: ${error}`);
    const refused = outcome("launch-failure", { exitCode: null, stderr: "" }, [], error);
    return { ...refused, logFile: undefined };
  }

  try {
    await fs.rm(outputDir, { recursive: true, force: true });
    await ensureDir(outputDir);
    await ensureDir(path.dirname(logFile));

    const launchProblem = await checkExecutable(executable);
    if (launchProblem) {
      const empty = { exitCode: null, stdout: "", stderr: "" };
      await fs.writeFile(logFile, formatCaseLog(testCase, null, empty, launchProblem));
      deps.logger.warn(`${testCase.id}: ${launchProblem}`);
      return outcome("launch-failure", empty, [], launchProblem);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, deps.timeoutMs);
    const onAbort = (): void => controller.abort();
    deps.signal.addEventListener("abort", onAbort, { once: true });
    if (deps.signal.aborted) controller.abort();

    deps.logger.debug(`Running ${testCase.id}: ${executable} ${args.join(" ")}`);
    let result: RunResult;
    try {
      result = await deps.runner.run({
        executable,
        args: [...args, testCase.inputPath],
        cwd: outputDir,
        signal: controller.signal,
        graceMs: deps.graceMs,
      });
    } finally {
      clearTimeout(timer);
      deps.signal.removeEventListener("abort", onAbort);
    }

    const status = statusOf(result, timedOut, deps.signal.aborted);
    const error =
      result.launchError ??
      (status === "timeout" ? `Timed out after ${deps.timeoutMs}ms` : undefined);
    const version = status === "launch-failure" ? null : await deps.version(executable);
    await fs.writeFile(logFile, formatCaseLog(testCase, version, result, error));

    const artifacts = (await listFiles(outputDir)).map((file) =>
      toPosix(path.relative(deps.outputRoot, path.join(outputDir, file))),
    );
    return outcome(status, result, artifacts, error);
  } catch (error) {
    deps.logger.error(`${testCase.id}: ${errorMessage(error)}`);
    return outcome("launch-failure", { exitCode: null, stderr: "" }, [], errorMessage(error));
  }
}

function cancelledOutcome(testCase: TestCase, outputRoot: string): ExecutionOutcome {
  return {
    caseId: testCase.id,
    status: "cancelled",
    exitCode: null,
    stderrTail: "",
    durationMs: 0,
    outputDir: caseOutputDir(outputRoot, testCase),
    artifacts: [],
    error: "Cancelled before start",
  };
}

async function* toAsync<T>(source: AsyncIterable<T> | Iterable<T>): AsyncGenerator<T> {
  yield* source;
}

/**
 * Run cases with a fixed-size worker pool
 *
 * @throws ValidationError if concurrency is not an integer of at least 1
 */
export function dispatch(
  cases: AsyncIterable<TestCase> | Iterable<TestCase>,
  options: DispatchOptions,
): AsyncIterable<CaseCompletion> {
  const { concurrency } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(`Concurrency must be an integer of at least 1, got ${concurrency}`, {
      field: "concurrency",
    });
  }

  const logger = options.logger ?? createSilentLogger();
  const signal = options.signal ?? new AbortController().signal;
  const runner = options.runner ?? execaRunner;
  const versions = new Map<string, Promise<string | null>>();
  const deps: Omit<CaseRunDeps, "claims"> = {
    outputRoot: options.outputRoot,
    timeoutMs: options.timeoutMs,
    graceMs: options.graceMs ?? DEFAULT_GRACE_MS,
    signal,
    runner,
    logger,
    version: (executable) => {
      let version = versions.get(executable);
      if (!version) {
        version = runner.version
          ? runner.version(executable).catch(() => null)
          : Promise.resolve(null);
        versions.set(executable, version);
      }
      return version;
    },
  };

  return {
    [Symbol.asyncIterator](): AsyncIterator<CaseCompletion> {
      const channel = createChannel<CaseCompletion>(concurrency);
      const runDeps: CaseRunDeps = { ...deps, claims: new OutputClaims(options.outputRoot) };
      const source = toAsync(cases);
      let stopped = false;
      let failure: { error: unknown } | undefined;

      async function worker(): Promise<void> {
        try {
          while (!stopped && !signal.aborted) {
            const next = await source.next();
            if (next.done) return;
            const testCase = next.value;

            let outcome: ExecutionOutcome;
            if (signal.aborted) {
              outcome = cancelledOutcome(testCase, options.outputRoot);
            } else {
              options.onStart?.(testCase);
              outcome = await runCase(testCase, runDeps);
            }
            const completion = { testCase, outcome };
            options.onOutcome?.(completion);
            if (!(await channel.send(completion))) return;
          }
        } catch (error) {
          // Discovery failed: the other workers finish their current case and stop
          failure ??= { error };
          stopped = true;
        }
      }

      const finished = Promise.all(Array.from({ length: concurrency }, () => worker())).finally(
        () => channel.close(),
      );
      const results = channel[Symbol.asyncIterator]();

      return {
        async next(): Promise<IteratorResult<CaseCompletion>> {
          const result = await results.next();
          if (result.done) {
            await finished;
            if (failure) throw failure.error;
          }
          return result;
        },
        async return(): Promise<IteratorResult<CaseCompletion>> {
          stopped = true;
          await results.return?.();
          await finished;
          return { value: undefined, done: true };
        },
      };
    },
  };
}
