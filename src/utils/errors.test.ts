/**
 * Tests for error utilities
 */

import { describe, it, expect } from "vitest";
import {
  HarnessError,
  ConfigError,
  DiscoveryError,
  FileSystemError,
  UnreadableArtifactError,
  ValidationError,
  isHarnessError,
  formatError,
  errorMessage,
  errnoCode,
} from "./errors.js";

describe("HarnessError", () => {
  it("should create error with required properties", () => {
    const error = new HarnessError("Test error", { code: "TEST_ERROR" });

    expect(error.message).toBe("Test error");
    expect(error.code).toBe("TEST_ERROR");
    expect(error.recoverable).toBe(false);
    expect(error.context).toEqual({});
    expect(error.suggestion).toBeUndefined();
  });

  it("should create error with all properties", () => {
    const cause = new Error("Original error");
    const error = new HarnessError("Test error", {
      code: "TEST_ERROR",
      context: { key: "value" },
      recoverable: true,
      suggestion: "Try again",
      cause,
    });

    expect(error.context).toEqual({ key: "value" });
    expect(error.recoverable).toBe(true);
    expect(error.suggestion).toBe("Try again");
    expect(error.cause).toBe(cause);
  });

  it("should serialize to JSON", () => {
    const error = new HarnessError("Test error", {
      code: "TEST_ERROR",
      context: { foo: "bar" },
      cause: new Error("inner"),
    });

    const json = error.toJSON();

    expect(json.name).toBe("HarnessError");
    expect(json.code).toBe("TEST_ERROR");
    expect(json.message).toBe("Test error");
    expect(json.context).toEqual({ foo: "bar" });
    expect(json.cause).toBe("inner");
  });
});

describe("DiscoveryError", () => {
  it("should carry the root path", () => {
    const error = new DiscoveryError("Data root does not exist: /data", { rootPath: "/data" });

    expect(error.name).toBe("DiscoveryError");
    expect(error.code).toBe("DISCOVERY_ERROR");
    expect(error.rootPath).toBe("/data");
    expect(error.context).toEqual({ rootPath: "/data" });
    expect(error.recoverable).toBe(false);
  });
});

describe("UnreadableArtifactError", () => {
  it("should carry the artifact path and be recoverable", () => {
    const error = new UnreadableArtifactError("Cannot parse", { path: "/out/a_flt.fits" });

    expect(error.name).toBe("UnreadableArtifactError");
    expect(error.code).toBe("UNREADABLE_ARTIFACT");
    expect(error.path).toBe("/out/a_flt.fits");
    expect(error.recoverable).toBe(true);
  });
});

describe("ConfigError", () => {
  it("should format issues one per line", () => {
    const error = new ConfigError("Invalid configuration", {
      issues: [
        { path: "execution.concurrency", message: "Expected number" },
        { path: "logging.level", message: "Invalid enum value" },
      ],
    });

    expect(error.formatIssues()).toBe(
      "  - execution.concurrency: Expected number\n  - logging.level: Invalid enum value",
    );
  });

  it("should format no issues as empty", () => {
    expect(new ConfigError("Bad").formatIssues()).toBe("");
  });
});

describe("FileSystemError", () => {
  it("should record path and operation in context", () => {
    const error = new FileSystemError("Failed", { path: "/tmp/x", operation: "move" });

    expect(error.code).toBe("FILESYSTEM_ERROR");
    expect(error.context).toEqual({ path: "/tmp/x", operation: "move" });
  });
});

describe("isHarnessError", () => {
  it("should recognise subclasses", () => {
    expect(isHarnessError(new ValidationError("bad"))).toBe(true);
    expect(isHarnessError(new Error("plain"))).toBe(false);
    expect(isHarnessError("string")).toBe(false);
  });
});

describe("formatError", () => {
  it("should include code and suggestion", () => {
    const error = new HarnessError("Broken", { code: "TEST", suggestion: "Fix it" });

    expect(formatError(error)).toBe("[TEST] Broken\n  Suggestion: Fix it");
  });

  it("should include config issues", () => {
    const error = new ConfigError("Invalid configuration", {
      issues: [{ path: "pipelines", message: "Required" }],
    });

    expect(formatError(error)).toBe(
      "[CONFIG_ERROR] Invalid configuration\n  - pipelines: Required\n" +
        "  Suggestion: Check your .regress/config.json and command line options",
    );
  });

  it("should format plain errors with the generic suggestion", () => {
    expect(formatError(new Error("boom"))).toBe(
      "boom\n  Suggestion: An unexpected error occurred. Re-run with REGRESS_LOG_LEVEL=debug.",
    );
  });

  it("should stringify non-errors", () => {
    expect(formatError(42)).toBe("42");
  });
});

describe("errorMessage", () => {
  it("should use the message of errors and stringify anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("text")).toBe("text");
  });
});

describe("errnoCode", () => {
  it("should read the code of system errors", () => {
    const error = Object.assign(new Error("missing"), { code: "ENOENT" });

    expect(errnoCode(error)).toBe("ENOENT");
    expect(errnoCode(new Error("no code"))).toBeUndefined();
    expect(errnoCode({ code: "ENOENT" })).toBeUndefined();
  });
});
