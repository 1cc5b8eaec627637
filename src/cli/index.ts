#!/usr/bin/env node

/**
 * regress CLI entry point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerRunCommand } from "./commands/run.js";
import { registerDiffCommand } from "./commands/diff.js";
import { registerCleanCommand } from "./commands/clean.js";
import { registerFindCommand } from "./commands/find.js";
import { formatError } from "../utils/errors.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("regress")
    .description("Regression harness for FITS calibration pipelines")
    .version(VERSION, "-V, --version", "Output the current version")
    .option("-c, --config <path>", "Configuration file (default: .regress/config.json)")
    .option("--log-level <level>", "silly, trace, debug, info, warn, error or fatal")
    .option("-v, --verbose", "Also report passing cases and identical artifacts");

  registerRunCommand(program);
  registerDiffCommand(program);
  registerCleanCommand(program);
  registerFindCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
