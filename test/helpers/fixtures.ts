/**
 * Temporary directories and FITS fixtures for tests
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { writeFits, type CardValue, type UnitSpec } from "../../src/artifacts/fits/writer.js";

export async function makeTempDir(prefix: string = "regress-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a header-only primary input, as a pipeline would receive it
 */
export async function writeRawInput(
  filePath: string,
  header: Record<string, CardValue>,
): Promise<void> {
  await writeFits(filePath, [{ header }]);
}

/**
 * A calibrated product: empty primary plus one SCI image extension
 */
export function productUnits(
  values: number[],
  header: Record<string, CardValue> = {},
): UnitSpec[] {
  return [
    { header: { INSTRUME: "WFC3", DATE: "2024-01-01" } },
    {
      name: "SCI",
      header,
      data: { type: "image", bitpix: -64, shape: [values.length], values },
    },
  ];
}

/**
 * Write a shell script that exits with the given code
 */
export async function writeExecutable(
  dir: string,
  name: string,
  exitCode: number = 0,
): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, `#!/bin/sh\nexit ${exitCode}\n`, { mode: 0o755 });
  return filePath;
}
