/**
 * Tests for live comparison
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import path from "node:path";
import { createExecutionJudge, createLiveComparator } from "./live-comparator.js";
import type { CaseCompletion } from "./dispatcher.js";
import type { ExecutionOutcome, TestCase } from "./types.js";
import { writeFits } from "../artifacts/fits/writer.js";
import { makeTempDir, productUnits, removeDir } from "../../test/helpers/fixtures.js";

function completion(
  outputRoot: string,
  artifacts: string[],
  status: ExecutionOutcome["status"] = "success",
): CaseCompletion {
  const testCase: TestCase = {
    id: "set/j1_raw.fits",
    index: 3,
    inputPath: "/data/set/j1_raw.fits",
    inputDir: "/data/set",
    command: { executable: "/opt/bin/calacs.e", args: [], pipeline: "calacs" },
    tags: {},
  };
  return {
    testCase,
    outcome: {
      caseId: testCase.id,
      status,
      exitCode: status === "success" ? 0 : 1,
      stderrTail: "",
      durationMs: 5,
      outputDir: path.join(outputRoot, "set", "j1_raw.fits.d"),
      artifacts,
    },
  };
}

function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
}

describe("createLiveComparator", () => {
  let dir: string;
  let outputRoot: string;
  let referenceRoot: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    outputRoot = path.join(dir, "out");
    referenceRoot = path.join(dir, "ref");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should pass a case whose artifacts match the reference", async () => {
    await writeFits(
      path.join(referenceRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1, 2]),
    );
    await writeFits(
      path.join(outputRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1, 2]),
    );
    const logger = mockLogger();
    const judge = createLiveComparator({
      outputRoot,
      referenceRoot,
      comparison: {},
      logger: logger as never,
    });

    const result = await judge(completion(outputRoot, ["set/j1_raw.fits.d/j1_flt.fits"]));

    expect(result.verdict).toBe("pass");
    expect(result.index).toBe(3);
    expect(result.diffs).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith("PASS set/j1_raw.fits");
  });

  it("should fail on differing data and warn", async () => {
    await writeFits(
      path.join(referenceRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1, 2]),
    );
    await writeFits(
      path.join(outputRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1, 9]),
    );
    const logger = mockLogger();
    const judge = createLiveComparator({
      outputRoot,
      referenceRoot,
      comparison: {},
      logger: logger as never,
    });

    const result = await judge(completion(outputRoot, ["set/j1_raw.fits.d/j1_flt.fits"]));

    expect(result.verdict).toBe("fail");
    expect(logger.warn).toHaveBeenCalledWith("FAIL set/j1_raw.fits");
  });

  it("should only compare artifacts with the configured suffixes", async () => {
    await writeFits(
      path.join(referenceRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1]),
    );
    await writeFits(
      path.join(outputRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1]),
    );
    const judge = createLiveComparator({ outputRoot, referenceRoot, comparison: {} });

    const result = await judge(
      completion(outputRoot, ["set/j1_raw.fits.d/j1_flt.fits", "set/j1_raw.fits.d/j1.tra"]),
    );

    expect(result.unexpectedArtifacts).toEqual([]);
    expect(result.verdict).toBe("pass");
  });

  it("should report missing and unexpected artifacts", async () => {
    await writeFits(
      path.join(referenceRoot, "set", "j1_raw.fits.d", "j1_crj.fits"),
      productUnits([1]),
    );
    await writeFits(
      path.join(outputRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1]),
    );
    const judge = createLiveComparator({ outputRoot, referenceRoot, comparison: {} });

    const result = await judge(completion(outputRoot, ["set/j1_raw.fits.d/j1_flt.fits"]));

    expect(result.missingArtifacts).toEqual(["set/j1_raw.fits.d/j1_crj.fits"]);
    expect(result.unexpectedArtifacts).toEqual(["set/j1_raw.fits.d/j1_flt.fits"]);
    expect(result.verdict).toBe("error");
  });

  it("should skip comparison when execution failed", async () => {
    await writeFits(
      path.join(referenceRoot, "set", "j1_raw.fits.d", "j1_flt.fits"),
      productUnits([1]),
    );
    const judge = createLiveComparator({ outputRoot, referenceRoot, comparison: {} });

    const result = await judge(completion(outputRoot, [], "non-zero"));

    expect(result.verdict).toBe("error");
    expect(result.missingArtifacts).toEqual([]);
    expect(result.outcome?.status).toBe("non-zero");
  });
});

describe("createExecutionJudge", () => {
  it("should pass successful executions and error the rest", async () => {
    const logger = mockLogger();
    const judge = createExecutionJudge(logger as never);

    const passed = await judge(completion("/out", []));
    const failed = await judge(completion("/out", [], "timeout"));

    expect(passed.verdict).toBe("pass");
    expect(failed.verdict).toBe("error");
    expect(logger.warn).toHaveBeenCalledWith("ERROR set/j1_raw.fits");
  });
});
