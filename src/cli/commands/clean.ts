import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { DEFAULT_KEEP, cleanTree, moveTree } from "../../housekeeping/tree.js";
import { createCliLogger, loadCliConfig, type GlobalOptions } from "../shared.js";

type KeepOptions = GlobalOptions & { keep?: string[] };

export function registerCleanCommand(program: Command): void {
  program
    .command("clean")
    .description("Delete every file under a tree except the primary inputs")
    .argument("<root>", "Tree to clean")
    .option("-k, --keep <glob...>", "Patterns of files to keep", DEFAULT_KEEP)
    .action(async (root: string, _options: KeepOptions, command: Command) => {
      await runClean(root, command.optsWithGlobals<KeepOptions>());
    });

  program
    .command("move")
    .description("Move every file except the primary inputs to <destination>/results")
    .argument("<source>", "Tree holding generated files")
    .argument("<destination>", "Directory receiving the results tree")
    .option("-k, --keep <glob...>", "Patterns of files left in place", DEFAULT_KEEP)
    .action(
      async (source: string, destination: string, _options: KeepOptions, command: Command) => {
        await runMove(source, destination, command.optsWithGlobals<KeepOptions>());
      },
    );
}

export async function runClean(root: string, options: KeepOptions = {}): Promise<void> {
  const logger = createCliLogger(await loadCliConfig(options));
  p.intro(chalk.cyan("Clean"));
  p.log.step(`Removing all but ${(options.keep ?? DEFAULT_KEEP).join(", ")} from ${root}`);
  const removed = await cleanTree(root, { keep: options.keep, logger });
  p.outro(chalk.green(`Removed ${removed.length} files`));
}

export async function runMove(
  source: string,
  destination: string,
  options: KeepOptions = {},
): Promise<void> {
  const logger = createCliLogger(await loadCliConfig(options));
  p.intro(chalk.cyan("Move"));
  p.log.step(`Moving all but ${(options.keep ?? DEFAULT_KEEP).join(", ")} from ${source}`);
  const moved = await moveTree(source, destination, { keep: options.keep, logger });
  p.outro(chalk.green(`Moved ${moved.length} files to ${destination}/results`));
}
