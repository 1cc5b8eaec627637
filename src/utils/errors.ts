/**
 * Error types raised by the harness.
 *
 * Only conditions that stop a whole run are thrown out of the entry points;
 * per-case failures are recorded on the case result instead.
 */

export interface HarnessErrorOptions {
  /** Stable machine-readable identifier, e.g. DISCOVERY_ERROR */
  code: string;
  context?: Record<string, unknown>;
  /** Whether the run as a whole can carry on */
  recoverable?: boolean;
  /** Printed under the message by the CLI */
  suggestion?: string;
  cause?: Error;
}

export class HarnessError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(message: string, options: HarnessErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "HarnessError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, HarnessError);
  }

  /** Shape written to JSON log files */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A filesystem operation on a tree failed; housekeeping raises one for a
 * whole batch with an AggregateError as the cause
 */
export class FileSystemError extends HarnessError {
  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write" | "delete" | "move" | "walk";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation },
      recoverable: false,
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
  }
}

/**
 * The data root handed to discovery is missing or not a directory.
 * Fatal: raised before any case is dispatched.
 */
export class DiscoveryError extends HarnessError {
  readonly rootPath: string;

  constructor(message: string, options: { rootPath: string; cause?: Error }) {
    super(message, {
      code: "DISCOVERY_ERROR",
      context: { rootPath: options.rootPath },
      recoverable: false,
      suggestion: `Check the root data path: ${options.rootPath}`,
      cause: options.cause,
    });
    this.name = "DiscoveryError";
    this.rootPath = options.rootPath;
  }
}

/**
 * An artifact could not be opened or parsed
 */
export class UnreadableArtifactError extends HarnessError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: Error }) {
    super(message, {
      code: "UNREADABLE_ARTIFACT",
      context: { path: options.path },
      recoverable: true,
      suggestion: "The file may be truncated or not a supported artifact format",
      cause: options.cause,
    });
    this.name = "UnreadableArtifactError";
    this.path = options.path;
  }
}

/**
 * The configuration file or a command line option is invalid
 */
export class ConfigError extends HarnessError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your .regress/config.json and command line options",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * A user-supplied value such as a selector expression or thread count is malformed
 */
export class ValidationError extends HarnessError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; cause?: Error } = {}) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: { field: options.field },
      recoverable: true,
      suggestion: "Check the input data format",
      cause: options.cause,
    });
    this.name = "ValidationError";
    this.field = options.field;
  }
}

export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

const UNEXPECTED_HINT = "An unexpected error occurred. Re-run with REGRESS_LOG_LEVEL=debug.";

/**
 * Render an error for the terminal: code, message, config issues and a hint
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (!(error instanceof HarnessError)) {
    return `${error.message}\n  Suggestion: ${UNEXPECTED_HINT}`;
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error instanceof ConfigError && error.issues.length > 0) {
    lines.push(error.formatIssues());
  }
  if (error.suggestion) {
    lines.push(`  Suggestion: ${error.suggestion}`);
  }
  return lines.join("\n");
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Errno code of a Node.js system error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
