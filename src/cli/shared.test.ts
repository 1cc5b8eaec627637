/**
 * Tests for shared CLI helpers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createDefaultConfig } from "../config/schema.js";
import { ValidationError } from "../utils/errors.js";
import type { RunReport } from "../harness/types.js";

vi.mock("@clack/prompts", () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  log: {
    info: vi.fn(),
    step: vi.fn(),
    warn: vi.fn(),
  },
}));

vi.mock("../config/loader.js", () => ({
  loadConfig: vi.fn(),
}));

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    mode: "execute",
    cases: [],
    counts: { pass: 1, fail: 0, error: 0, total: 1 },
    aborted: false,
    startedAt: "2024-01-01T00:00:00.000Z",
    durationMs: 5,
    ...overrides,
  };
}

describe("resolveThreads", () => {
  it("should keep a request within the CPU count", async () => {
    const { resolveThreads } = await import("./shared.js");

    expect(resolveThreads(3, 8)).toBe(3);
    expect(resolveThreads(8, 8)).toBe(8);
    expect(resolveThreads(2.7, 8)).toBe(2);
  });

  it("should fall back to the CPU count for out-of-range requests", async () => {
    const { resolveThreads } = await import("./shared.js");

    expect(resolveThreads(undefined, 8)).toBe(8);
    expect(resolveThreads(0, 8)).toBe(8);
    expect(resolveThreads(-2, 8)).toBe(8);
    expect(resolveThreads(9, 8)).toBe(8);
    expect(resolveThreads(Number.NaN, 8)).toBe(8);
  });
});

describe("parseInteger", () => {
  it("should parse integers and reject anything else", async () => {
    const { parseInteger } = await import("./shared.js");

    expect(parseInteger("12", "threads")).toBe(12);
    expect(parseInteger("-1", "threads")).toBe(-1);
    expect(() => parseInteger("1.5", "threads")).toThrow(
      'Expected an integer for threads, got "1.5"',
    );
    expect(() => parseInteger("many", "timeout")).toThrow(ValidationError);
  });
});

describe("parsePositiveInteger", () => {
  it("should reject zero and negative values", async () => {
    const { parsePositiveInteger } = await import("./shared.js");

    expect(parsePositiveInteger("1", "timeout")).toBe(1);
    expect(() => parsePositiveInteger("0", "timeout")).toThrow(
      'Expected timeout of at least 1, got "0"',
    );
    expect(() => parsePositiveInteger("-5", "timeout")).toThrow(ValidationError);
  });
});

describe("parseLogLevel", () => {
  it("should accept known levels in any case", async () => {
    const { parseLogLevel } = await import("./shared.js");

    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("WARN")).toBe("warn");
  });

  it("should reject unknown levels", async () => {
    const { parseLogLevel } = await import("./shared.js");

    expect(() => parseLogLevel("loud")).toThrow(
      'Unknown log level "loud": expected one of silly, trace, debug, info, warn, error, fatal',
    );
  });
});

describe("loadCliConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should pass the config path through and override the log level", async () => {
    const { loadConfig } = await import("../config/loader.js");
    vi.mocked(loadConfig).mockResolvedValue(createDefaultConfig());
    const { loadCliConfig } = await import("./shared.js");

    const config = await loadCliConfig({ config: "/tmp/regress.json", logLevel: "error" });

    expect(loadConfig).toHaveBeenCalledWith("/tmp/regress.json");
    expect(config.logging.level).toBe("error");
  });

  it("should keep the configured level without an override", async () => {
    const { loadConfig } = await import("../config/loader.js");
    const configured = createDefaultConfig();
    configured.logging.level = "debug";
    vi.mocked(loadConfig).mockResolvedValue(configured);
    const { loadCliConfig } = await import("./shared.js");

    expect((await loadCliConfig({})).logging.level).toBe("debug");
  });
});

describe("printReport", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return zero for a clean run and print only the summary", async () => {
    const prompts = await import("@clack/prompts");
    const { printReport } = await import("./shared.js");

    expect(printReport(report())).toBe(0);
    expect(console.log).not.toHaveBeenCalled();
    expect(prompts.outro).toHaveBeenCalledWith(
      expect.stringContaining("1 cases: 1 passed, 0 failed, 0 errors"),
    );
  });

  it("should print case details and return one for a failing run", async () => {
    const prompts = await import("@clack/prompts");
    const { printReport } = await import("./shared.js");

    const code = printReport(
      report({
        counts: { pass: 0, fail: 0, error: 1, total: 1 },
        cases: [
          {
            caseId: "b",
            index: 0,
            diffs: [],
            missingArtifacts: ["b/x.fits"],
            unexpectedArtifacts: [],
            errors: [],
            verdict: "error",
          },
        ],
      }),
    );

    expect(code).toBe(1);
    expect(console.log).toHaveBeenCalledWith("[ERROR] b\n  missing: b/x.fits\n");
    expect(prompts.outro).toHaveBeenCalledWith(
      expect.stringContaining("1 cases: 0 passed, 0 failed, 1 errors"),
    );
  });

  it("should return one for an aborted run", async () => {
    const { printReport } = await import("./shared.js");

    expect(printReport(report({ aborted: true }))).toBe(1);
  });
});

describe("abortOnSigint", () => {
  it("should abort on the first interrupt and detach", async () => {
    const { abortOnSigint } = await import("./shared.js");
    const controller = new AbortController();
    const before = process.listenerCount("SIGINT");

    const release = abortOnSigint(controller);
    expect(process.listenerCount("SIGINT")).toBe(before + 1);
    process.emit("SIGINT");

    expect(controller.signal.aborted).toBe(true);
    expect(process.listenerCount("SIGINT")).toBe(before);
    release();
    expect(process.listenerCount("SIGINT")).toBe(before);
  });

  it("should remove the handler when released", async () => {
    const { abortOnSigint } = await import("./shared.js");
    const controller = new AbortController();
    const before = process.listenerCount("SIGINT");

    abortOnSigint(controller)();

    expect(process.listenerCount("SIGINT")).toBe(before);
    expect(controller.signal.aborted).toBe(false);
  });
});
