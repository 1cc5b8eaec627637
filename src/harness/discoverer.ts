/**
 * Case discovery
 *
 * Walks a data root in sorted order, reads the primary header of every
 * primary input and yields one TestCase per input whose header passes the
 * selector and matches a configured pipeline. Discovery is lazy: nothing is
 * read until the consumer pulls, and each iteration starts a fresh walk.
 */

import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import { readPrimaryHeader } from "../artifacts/registry.js";
import type { Header } from "../artifacts/types.js";
import type { Pipeline } from "../config/schema.js";
import { DiscoveryError, errorMessage } from "../utils/errors.js";
import { toPosix } from "../utils/files.js";
import { createSilentLogger } from "../utils/logger.js";
import { matchesSelector, parseSelector, selectorKeywords, type Selector } from "./selector.js";
import type { TestCase } from "./types.js";

export type PrimaryInputPredicate = (fileName: string) => boolean;

export const DEFAULT_MAX_DEPTH = 16;

/**
 * Accept files whose name ends with one of the suffixes
 */
export function suffixPredicate(suffixes: readonly string[]): PrimaryInputPredicate {
  return (fileName) => suffixes.some((suffix) => fileName.endsWith(suffix));
}

export interface WalkOptions {
  isPrimaryInput?: PrimaryInputPredicate;
  maxDepth?: number;
  logger?: Logger<ILogObj>;
}

export interface DiscoveryOptions extends WalkOptions {
  pipelines: readonly Pipeline[];
  /** Directory holding the pipeline executables */
  execPath: string;
  /** Inputs whose header does not match are skipped */
  selector?: Selector;
  /** Reads the primary header of an input; defaults to the FITS header reader */
  readHeader?: (inputPath: string) => Promise<Header>;
}

/**
 * @throws DiscoveryError if the root is missing or not a directory
 */
export async function assertDiscoveryRoot(
  rootPath: string,
  label: string = "Data root",
): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(rootPath);
  } catch (error) {
    throw new DiscoveryError(`${label} does not exist: ${rootPath}`, {
      rootPath,
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (!stat.isDirectory()) {
    throw new DiscoveryError(`${label} is not a directory: ${rootPath}`, { rootPath });
  }
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Yield primary input paths under a root, depth first in sorted name order.
 * Symbolic links are not followed; unreadable subdirectories are logged and skipped.
 */
export async function* walkPrimaryInputs(
  rootPath: string,
  options: WalkOptions = {},
): AsyncGenerator<string> {
  const isPrimaryInput = options.isPrimaryInput ?? suffixPredicate(["raw.fits"]);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const logger = options.logger ?? createSilentLogger();

  await assertDiscoveryRoot(rootPath);

  async function* walk(dir: string, depth: number): AsyncGenerator<string> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (depth === 0) {
        throw new DiscoveryError(`Cannot read data root ${dir}: ${errorMessage(error)}`, {
          rootPath: dir,
          cause: error instanceof Error ? error : undefined,
        });
      }
      logger.warn(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
      return;
    }

    entries.sort(byName);
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (depth < maxDepth) {
          yield* walk(fullPath, depth + 1);
        } else {
          logger.debug(`Not descending past depth ${maxDepth}: ${fullPath}`);
        }
      } else if (entry.isFile() && isPrimaryInput(entry.name)) {
        yield fullPath;
      }
    }
  }

  yield* walk(rootPath, 0);
}

function tagValue(header: Header, keyword: string): string | number | boolean | undefined {
  const found = header.get(keyword);
  return found?.type === "bigint" ? String(found.value) : found?.value;
}

/**
 * Lazily discover test cases under a data root
 *
 * @throws ValidationError immediately if a pipeline's match expression is malformed
 */
export function discoverCases(rootPath: string, options: DiscoveryOptions): AsyncIterable<TestCase> {
  const logger = options.logger ?? createSilentLogger();
  const readHeader = options.readHeader ?? readPrimaryHeader;
  const pipelines = options.pipelines.map((pipeline) => ({
    pipeline,
    match: parseSelector(pipeline.match),
  }));

  async function* generate(): AsyncGenerator<TestCase> {
    let index = 0;
    for await (const inputPath of walkPrimaryInputs(rootPath, { ...options, logger })) {
      let header: Header;
      try {
        header = await readHeader(inputPath);
      } catch (error) {
        logger.warn(`Skipping unreadable input ${inputPath}: ${errorMessage(error)}`);
        continue;
      }

      if (options.selector && !matchesSelector(options.selector, header)) {
        logger.debug(`Input does not match selector: ${inputPath}`);
        continue;
      }

      const resolved = pipelines.find(({ match }) => matchesSelector(match, header));
      if (!resolved) {
        logger.debug(`No pipeline handles input: ${inputPath}`);
        continue;
      }

      const tags: Record<string, string | number | boolean> = {};
      const keywords = [
        ...(options.selector ? selectorKeywords(options.selector) : []),
        ...selectorKeywords(resolved.match),
      ];
      for (const keyword of keywords) {
        const value = tagValue(header, keyword);
        if (value !== undefined) tags[keyword] = value;
      }

      const { pipeline } = resolved;
      const testCase: TestCase = Object.freeze({
        id: toPosix(path.relative(rootPath, inputPath)),
        index: index++,
        inputPath,
        inputDir: path.dirname(inputPath),
        command: Object.freeze({
          executable: path.join(options.execPath, pipeline.executable),
          args: [...pipeline.args],
          pipeline: pipeline.name,
        }),
        tags: Object.freeze(tags),
      });
      logger.debug(`Discovered ${testCase.id} (${pipeline.name})`);
      yield testCase;
    }
  }

  return {
    [Symbol.asyncIterator]: generate,
  };
}
