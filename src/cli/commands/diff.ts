import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { createRunContext } from "../../harness/context.js";
import { diffOnly } from "../../harness/harness.js";
import {
  abortOnSigint,
  createCliLogger,
  loadCliConfig,
  printReport,
  resolveThreads,
  type GlobalOptions,
} from "../shared.js";

export function registerDiffCommand(program: Command): void {
  program
    .command("diff")
    .description("Compare the artifacts in a candidate tree against a reference tree")
    .argument("<reference>", "Tree holding the expected artifacts")
    .argument("<candidate>", "Tree holding the artifacts to check")
    .action(async (reference: string, candidate: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      process.exitCode = await runDiff(reference, candidate, options);
    });
}

/**
 * Diff two trees; resolves to the process exit code
 */
export async function runDiff(
  reference: string,
  candidate: string,
  options: GlobalOptions = {},
): Promise<number> {
  const config = await loadCliConfig(options);
  p.intro(chalk.cyan("Regression diff"));
  p.log.info(`Reference: ${reference}`);
  p.log.info(`Candidate: ${candidate}`);

  const controller = new AbortController();
  const release = abortOnSigint(controller);
  const context = createRunContext({
    logger: createCliLogger(config),
    signal: controller.signal,
    comparison: {
      tolerance: config.comparison.tolerance,
      ignoreKeywords: config.comparison.ignoreKeywords,
    },
  });

  try {
    const report = await diffOnly(
      path.resolve(reference),
      path.resolve(candidate),
      {
        artifactSuffixes: config.comparison.artifactSuffixes,
        concurrency: resolveThreads(config.execution.concurrency),
      },
      context,
    );
    return printReport(report, options.verbose);
  } finally {
    release();
  }
}
