/**
 * Helpers shared by the CLI commands
 */

import os from "node:os";
import path from "node:path";
import chalk from "chalk";
import * as p from "@clack/prompts";
import type { Logger, ILogObj } from "tslog";
import { loadConfig } from "../config/loader.js";
import { CONFIG_DIR, LOG_DIR } from "../config/paths.js";
import type { HarnessConfig } from "../config/schema.js";
import { formatRunReport, formatCounts } from "../harness/report.js";
import { isCleanRun } from "../harness/aggregator.js";
import type { RunReport } from "../harness/types.js";
import { ValidationError } from "../utils/errors.js";
import { LOG_LEVELS, createLogger, type LogLevel } from "../utils/logger.js";

/** Options registered on the root program */
export type GlobalOptions = {
  config?: string;
  logLevel?: string;
  verbose?: boolean;
};

/**
 * Load configuration and apply command line overrides shared by every command
 */
export async function loadCliConfig(options: GlobalOptions): Promise<HarnessConfig> {
  const config = await loadConfig(options.config);
  if (options.logLevel !== undefined) {
    config.logging.level = parseLogLevel(options.logLevel);
  }
  return config;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
  if (!level) {
    const expected = LOG_LEVELS.join(", ");
    throw new ValidationError(`Unknown log level "${value}": expected one of ${expected}`, {
      field: "logLevel",
    });
  }
  return level;
}

export function createCliLogger(config: HarnessConfig): Logger<ILogObj> {
  return createLogger({
    level: config.logging.level,
    logFile: config.logging.logToFile
      ? path.join(process.cwd(), CONFIG_DIR, LOG_DIR, "regress.log")
      : undefined,
  });
}

/**
 * Worker count for a run. Values of zero or less, or above the CPU count,
 * fall back to the CPU count.
 */
export function resolveThreads(
  requested: number | undefined,
  cpus: number = os.availableParallelism(),
): number {
  if (requested === undefined || !Number.isFinite(requested)) return cpus;
  const threads = Math.floor(requested);
  if (threads <= 0 || threads > cpus) return cpus;
  return threads;
}

export function parseInteger(value: string, field: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ValidationError(`Expected an integer for ${field}, got "${value}"`, { field });
  }
  return n;
}

export function parsePositiveInteger(value: string, field: string): number {
  const n = parseInteger(value, field);
  if (n < 1) {
    throw new ValidationError(`Expected ${field} of at least 1, got "${value}"`, { field });
  }
  return n;
}

/**
 * Print a report and return the process exit code for it
 */
export function printReport(report: RunReport, verbose: boolean = false): number {
  const body = formatRunReport(report, { verbose });
  const lines = body.split("\n");
  const summary = lines.pop() ?? formatCounts(report);
  if (lines.length > 0) {
    console.log(lines.join("\n"));
  }

  const clean = isCleanRun(report);
  if (clean) {
    p.outro(chalk.green(summary));
  } else {
    p.outro(chalk.red(summary));
  }
  return clean ? 0 : 1;
}

/**
 * Abort a controller on the first Ctrl-C; returns a function removing the handler
 */
export function abortOnSigint(controller: AbortController): () => void {
  const onSigint = (): void => {
    p.log.warn("Interrupted: stopping running cases");
    controller.abort(new Error("Interrupted"));
  };
  process.once("SIGINT", onSigint);
  return () => {
    process.removeListener("SIGINT", onSigint);
  };
}
