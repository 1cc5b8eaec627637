/**
 * Tests for tree statistics
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { suffixOf, summarizeTrees } from "./tree-summary.js";
import { makeTempDir, removeDir } from "../../test/helpers/fixtures.js";

describe("suffixOf", () => {
  it("should return the last extension or a placeholder", () => {
    expect(suffixOf("a/j1_flt.fits")).toBe(".fits");
    expect(suffixOf("a/j1.tra")).toBe(".tra");
    expect(suffixOf("a/README")).toBe("(none)");
  });
});

describe("summarizeTrees", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function write(root: string, file: string, content: string): Promise<void> {
    const full = path.join(dir, root, file);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content);
  }

  it("should count byte-differing and one-sided files by suffix", async () => {
    await write("ref", "a/same.fits", "1");
    await write("cand", "a/same.fits", "1");
    await write("ref", "a/diff.fits", "1");
    await write("cand", "a/diff.fits", "2");
    await write("ref", "a/diff.tra", "x");
    await write("cand", "a/diff.tra", "y");
    await write("ref", "a/gone.fits", "");
    await write("cand", "a/new.fits", "");
    await write("cand", "a/NOTES", "");

    const summary = await summarizeTrees(
      path.join(dir, "ref"),
      path.join(dir, "cand"),
      ["a/diff.fits", "a/diff.tra", "a/gone.fits", "a/same.fits"],
      ["a/NOTES", "a/diff.fits", "a/diff.tra", "a/new.fits", "a/same.fits"],
    );

    expect(summary).toEqual({
      differing: { total: 2, bySuffix: { ".fits": 1, ".tra": 1 } },
      referenceOnly: { total: 1, bySuffix: { ".fits": 1 } },
      candidateOnly: { total: 2, bySuffix: { "(none)": 1, ".fits": 1 } },
    });
  });

  it("should report empty counts for identical trees", async () => {
    await write("ref", "x.fits", "1");
    await write("cand", "x.fits", "1");

    const summary = await summarizeTrees(
      path.join(dir, "ref"),
      path.join(dir, "cand"),
      ["x.fits"],
      ["x.fits"],
    );

    expect(summary.differing).toEqual({ total: 0, bySuffix: {} });
  });
});
