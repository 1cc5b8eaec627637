import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { formatSelector, selectorFromArgs } from "../../harness/selector.js";
import { findInputs } from "../../housekeeping/find.js";
import { createCliLogger, loadCliConfig, type GlobalOptions } from "../shared.js";

export function registerFindCommand(program: Command): void {
  program
    .command("find")
    .description("List primary inputs whose header matches the given keyword values")
    .argument("<root>", "Tree to search")
    .argument("<keyword>", "Header keyword")
    .argument("<value>", "Value the keyword must have")
    .argument("[more...]", "Further <and|or> <keyword> <value> triples")
    .action(
      async (
        root: string,
        keyword: string,
        value: string,
        more: string[],
        _options: unknown,
        command: Command,
      ) => {
        await runFind(root, [keyword, value, ...more], command.optsWithGlobals<GlobalOptions>());
      },
    );
}

/**
 * Print matching inputs, one per line, and return them
 */
export async function runFind(
  root: string,
  terms: string[],
  options: GlobalOptions = {},
): Promise<string[]> {
  const selector = selectorFromArgs(terms);
  const config = await loadCliConfig(options);
  p.intro(chalk.cyan("Find"));
  p.log.step(`Searching ${root} for ${formatSelector(selector)}`);

  const found = await findInputs(root, selector, {
    suffixes: config.discovery.primarySuffixes,
    maxDepth: config.discovery.maxDepth,
    logger: createCliLogger(config),
  });
  for (const file of found) {
    console.log(file);
  }
  p.outro(`${found.length} files found`);
  return found;
}
