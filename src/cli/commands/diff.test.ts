/**
 * Tests for diff command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import path from "node:path";
import { createDefaultConfig } from "../../config/schema.js";
import { writeFits } from "../../artifacts/fits/writer.js";
import { makeTempDir, productUnits, removeDir } from "../../../test/helpers/fixtures.js";

vi.mock("@clack/prompts", () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  log: {
    info: vi.fn(),
    step: vi.fn(),
    warn: vi.fn(),
  },
}));

vi.mock("../../config/loader.js", () => ({
  loadConfig: vi.fn(),
}));

describe("diff command", () => {
  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    dir = await makeTempDir();
    await writeFits(path.join(dir, "ref", "a", "x_flt.fits"), productUnits([1, 2]));
    await writeFits(path.join(dir, "cand", "a", "x_flt.fits"), productUnits([1, 2]));
    const config = createDefaultConfig();
    config.logging.level = "fatal";
    const { loadConfig } = await import("../../config/loader.js");
    vi.mocked(loadConfig).mockResolvedValue(config);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  describe("runDiff", () => {
    it("should exit cleanly when the trees agree", async () => {
      const { runDiff } = await import("./diff.js");
      const prompts = await import("@clack/prompts");

      const code = await runDiff(path.join(dir, "ref"), path.join(dir, "cand"));

      expect(code).toBe(0);
      expect(prompts.outro).toHaveBeenCalledWith(
        expect.stringContaining("1 cases: 1 passed, 0 failed, 0 errors"),
      );
    });

    it("should print the failing case and exit with one", async () => {
      await writeFits(path.join(dir, "cand", "a", "x_flt.fits"), productUnits([1, 3]));
      const { runDiff } = await import("./diff.js");

      const code = await runDiff(path.join(dir, "ref"), path.join(dir, "cand"));

      expect(code).toBe(1);
      const printed = vi.mocked(console.log).mock.calls[0]?.[0];
      expect(typeof printed === "string" && printed.split("\n")[0]).toBe("[FAIL] a");
    });

    it("should reject a missing candidate tree", async () => {
      const { runDiff } = await import("./diff.js");

      await expect(runDiff(path.join(dir, "ref"), path.join(dir, "none"))).rejects.toThrow(
        `Candidate tree does not exist: ${path.join(dir, "none")}`,
      );
    });
  });
});
