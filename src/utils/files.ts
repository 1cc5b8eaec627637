/**
 * File utilities for fits-regress
 */

import fs from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import { FileSystemError, errnoCode } from "./errors.js";

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create directory: ${dirPath}`, {
      path: dirPath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") {
      return false;
    }
    throw new FileSystemError(`Failed to stat: ${dirPath}`, {
      path: dirPath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * List every regular file under a directory as sorted POSIX paths relative to it.
 * A missing directory lists as empty.
 */
export async function listFiles(
  dirPath: string,
  options: { ignore?: string | string[] } = {},
): Promise<string[]> {
  if (!(await isDirectory(dirPath))) {
    return [];
  }

  try {
    const files = await glob("**/*", {
      cwd: dirPath,
      nodir: true,
      dot: true,
      posix: true,
      ignore: options.ignore,
    });
    return files.sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files under: ${dirPath}`, {
      path: dirPath,
      operation: "walk",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Compare two files byte for byte
 */
export async function filesEqual(a: string, b: string): Promise<boolean> {
  try {
    const [statA, statB] = await Promise.all([fs.stat(a), fs.stat(b)]);
    if (statA.size !== statB.size) {
      return false;
    }
    const [bufA, bufB] = await Promise.all([fs.readFile(a), fs.readFile(b)]);
    return bufA.equals(bufB);
  } catch (error) {
    throw new FileSystemError(`Failed to compare ${a} with ${b}`, {
      path: a,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Move a file, creating the destination directory.
 * Falls back to copy and unlink across devices.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  await ensureDir(path.dirname(destination));
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if (errnoCode(error) !== "EXDEV") {
      throw new FileSystemError(`Failed to move ${source} to ${destination}`, {
        path: source,
        operation: "move",
        cause: error instanceof Error ? error : undefined,
      });
    }
    await fs.copyFile(source, destination);
    await fs.unlink(source);
  }
}

/**
 * Convert a platform path to POSIX separators
 */
export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join("/");
}
