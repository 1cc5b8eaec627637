/**
 * Search a data tree for primary inputs by header values
 */

import type { Logger, ILogObj } from "tslog";
import { readPrimaryHeader } from "../artifacts/registry.js";
import type { Header } from "../artifacts/types.js";
import { suffixPredicate, walkPrimaryInputs } from "../harness/discoverer.js";
import { matchesSelector, parseSelector, type Selector } from "../harness/selector.js";
import { errorMessage } from "../utils/errors.js";
import { createSilentLogger } from "../utils/logger.js";

export interface FindOptions {
  suffixes?: readonly string[];
  maxDepth?: number;
  readHeader?: (inputPath: string) => Promise<Header>;
  logger?: Logger<ILogObj>;
}

/**
 * Paths of primary inputs under root whose header satisfies the query,
 * sorted and without duplicates
 */
export async function findInputs(
  root: string,
  query: Selector | string,
  options: FindOptions = {},
): Promise<string[]> {
  const selector = typeof query === "string" ? parseSelector(query) : query;
  const readHeader = options.readHeader ?? readPrimaryHeader;
  const logger = options.logger ?? createSilentLogger();
  const found = new Set<string>();

  for await (const inputPath of walkPrimaryInputs(root, {
    isPrimaryInput: suffixPredicate(options.suffixes ?? ["raw.fits"]),
    maxDepth: options.maxDepth,
    logger,
  })) {
    try {
      if (matchesSelector(selector, await readHeader(inputPath))) {
        found.add(inputPath);
      }
    } catch (error) {
      logger.warn(`Skipping unreadable input ${inputPath}: ${errorMessage(error)}`);
    }
  }

  return [...found].sort();
}
