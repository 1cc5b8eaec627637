/**
 * Tree housekeeping: clear generated files out of a data tree, or move
 * them into a results tree, leaving the primary inputs in place.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import { assertDiscoveryRoot } from "../harness/discoverer.js";
import { FileSystemError, errorMessage } from "../utils/errors.js";
import { listFiles, moveFile } from "../utils/files.js";
import { createSilentLogger } from "../utils/logger.js";

export interface HousekeepingOptions {
  /** Glob patterns, relative to the tree root, of files left untouched */
  keep?: string[];
  logger?: Logger<ILogObj>;
}

export const DEFAULT_KEEP = ["**/*raw.fits"];

/** Generated files are moved under this directory of the destination */
export const RESULTS_DIR = "results";

async function applyToFiles(
  root: string,
  options: HousekeepingOptions,
  operation: "delete" | "move",
  action: (relative: string) => Promise<void>,
): Promise<string[]> {
  await assertDiscoveryRoot(root, "Tree");
  const logger = options.logger ?? createSilentLogger();
  const files = await listFiles(root, { ignore: options.keep ?? DEFAULT_KEEP });

  const done: string[] = [];
  const failures: Error[] = [];
  for (const file of files) {
    try {
      await action(file);
      done.push(file);
    } catch (error) {
      logger.warn(`Cannot ${operation} ${file}: ${errorMessage(error)}`);
      failures.push(error instanceof Error ? error : new Error(errorMessage(error)));
    }
  }

  if (failures.length > 0) {
    const message = `Failed to ${operation} ${failures.length} of ${files.length} files under ${root}`;
    throw new FileSystemError(message, {
      path: root,
      operation,
      cause: new AggregateError(failures, failures.map((f) => f.message).join("; ")),
    });
  }
  return done;
}

/**
 * Delete every file under root not matching a keep pattern
 *
 * @returns Deleted files as POSIX paths relative to root
 * @throws FileSystemError listing every file that could not be deleted
 */
export async function cleanTree(root: string, options: HousekeepingOptions = {}): Promise<string[]> {
  const removed = await applyToFiles(root, options, "delete", (file) =>
    fs.rm(path.join(root, ...file.split("/"))),
  );
  options.logger?.info(`Removed ${removed.length} files from ${root}`);
  return removed;
}

/**
 * Move every file under source not matching a keep pattern to
 * `<destination>/results/<relative path>`
 *
 * @returns Moved files as POSIX paths relative to source
 */
export async function moveTree(
  source: string,
  destination: string,
  options: HousekeepingOptions = {},
): Promise<string[]> {
  const target = path.join(destination, RESULTS_DIR);
  const moved = await applyToFiles(source, options, "move", (file) =>
    moveFile(path.join(source, ...file.split("/")), path.join(target, ...file.split("/"))),
  );
  options.logger?.info(`Moved ${moved.length} files to ${target}`);
  return moved;
}
