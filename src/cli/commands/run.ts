import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { createRunContext } from "../../harness/context.js";
import { suffixPredicate } from "../../harness/discoverer.js";
import { executeAndReport } from "../../harness/harness.js";
import type { CommandRunner } from "../../harness/runner.js";
import { ConfigError } from "../../utils/errors.js";
import {
  abortOnSigint,
  createCliLogger,
  loadCliConfig,
  parseInteger,
  parsePositiveInteger,
  printReport,
  resolveThreads,
  type GlobalOptions,
} from "../shared.js";

export type RunCommandOptions = GlobalOptions & {
  root: string;
  output: string;
  exec: string;
  reference?: string;
  cte?: boolean;
  threads?: string;
  timeout?: string;
  select?: string;
};

/** Seams for tests */
export interface RunDeps {
  runner?: CommandRunner;
  signal?: AbortSignal;
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Run every test case under a data root and report the results")
    .requiredOption("-r, --root <path>", "Root path to regression test data")
    .requiredOption("-o, --output <path>", "Directory for all output; must not exist yet")
    .requiredOption("-e, --exec <path>", "Directory containing the pipeline executables")
    .option("-d, --reference <path>", "Diff each case's output against this tree as it completes")
    .option("--cte", "Only run CTE correction, on inputs with PCTECORR=PERFORM")
    .option("-n, --threads <n>", "Maximum number of cases run at once")
    .option("--timeout <seconds>", "Per-case time limit in seconds")
    .option("-s, --select <expr>", 'Only run inputs whose header matches, e.g. "INSTRUME=WFC3"')
    .action(async (_options: RunCommandOptions, command: Command) => {
      process.exitCode = await runRegression(command.optsWithGlobals<RunCommandOptions>());
    });
}

/**
 * Run the regression suite; resolves to the process exit code
 */
export async function runRegression(
  options: RunCommandOptions,
  deps: RunDeps = {},
): Promise<number> {
  const config = await loadCliConfig(options);
  const logger = createCliLogger(config);

  p.intro(chalk.cyan("Regression run"));

  const profile = options.cte ? config.profiles["cte"] : undefined;
  if (options.cte && !profile) {
    throw new ConfigError('No "cte" profile configured', {
      issues: [{ path: "profiles.cte", message: "required by --cte" }],
    });
  }
  const selectors = [profile?.selector, options.select].filter(
    (s): s is string => s !== undefined && s.trim() !== "",
  );

  const threads = resolveThreads(
    options.threads !== undefined
      ? parseInteger(options.threads, "threads")
      : config.execution.concurrency,
  );
  const timeoutMs =
    options.timeout !== undefined
      ? parsePositiveInteger(options.timeout, "timeout") * 1000
      : config.execution.timeoutMs;

  p.log.info(`Data root: ${options.root}`);
  p.log.info(`Output: ${options.output}`);
  if (options.reference) p.log.info(`Reference: ${options.reference}`);
  if (selectors.length > 0) p.log.info(`Selecting: ${selectors.join(" and ")}`);
  p.log.step(`Running with ${threads} workers`);

  const controller = new AbortController();
  const release = abortOnSigint(controller);
  const context = createRunContext({
    logger,
    signal: controller.signal,
    comparison: {
      tolerance: config.comparison.tolerance,
      ignoreKeywords: config.comparison.ignoreKeywords,
    },
  });

  try {
    const report = await executeAndReport(
      {
        rootPath: path.resolve(options.root),
        outputPath: path.resolve(options.output),
        execPath: path.resolve(options.exec),
        referencePath: options.reference ? path.resolve(options.reference) : undefined,
        concurrency: threads,
        timeoutMs,
        graceMs: config.execution.graceMs,
        selector: selectors.length > 0 ? selectors.join(" and ") : undefined,
        pipelines: profile?.pipelines ?? config.pipelines,
        isPrimaryInput: suffixPredicate(config.discovery.primarySuffixes),
        maxDepth: config.discovery.maxDepth,
        artifactSuffixes: config.comparison.artifactSuffixes,
        signal: deps.signal,
        runner: deps.runner,
      },
      context,
    );
    return printReport(report, options.verbose);
  } finally {
    release();
  }
}
