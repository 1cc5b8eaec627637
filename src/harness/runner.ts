/**
 * Child process seam for the dispatcher
 *
 * The dispatcher never spawns processes itself: it hands a RunRequest to a
 * CommandRunner, which lets tests substitute an in-process fake.
 */

import { execa } from "execa";

export interface RunRequest {
  executable: string;
  args: string[];
  cwd: string;
  /** Aborting terminates the child: SIGTERM, then SIGKILL after graceMs */
  signal: AbortSignal;
  graceMs: number;
}

export interface RunResult {
  /** Null when the child was killed by a signal or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** True when the child was stopped through the request signal */
  terminated: boolean;
  /** Set when the process could not be started */
  launchError?: string;
}

export interface CommandRunner {
  /** Must resolve, never reject, for anything the child process does */
  run(request: RunRequest): Promise<RunResult>;
  /** First line of `<executable> --version`, or null when unavailable */
  version?(executable: string): Promise<string | null>;
}

/** Output kept in memory per stream */
const MAX_OUTPUT_SIZE = 64 * 1024 * 1024;

const VERSION_TIMEOUT_MS = 10_000;

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Runner backed by execa
 */
export const execaRunner: CommandRunner = {
  async run({ executable, args, cwd, signal, graceMs }: RunRequest): Promise<RunResult> {
    const result = await execa(executable, args, {
      cwd,
      cancelSignal: signal,
      forceKillAfterDelay: Math.max(1, graceMs),
      reject: false,
      stdin: "ignore",
      maxBuffer: MAX_OUTPUT_SIZE,
    });

    const terminated = result.isCanceled || (signal.aborted && result.isTerminated);
    const exitCode = result.exitCode ?? null;
    const launchError =
      result.failed && exitCode === null && !terminated && result instanceof Error
        ? result.message
        : undefined;

    return {
      exitCode,
      stdout: text(result.stdout),
      stderr: text(result.stderr),
      terminated,
      launchError,
    };
  },

  async version(executable: string): Promise<string | null> {
    const result = await execa(executable, ["--version"], {
      reject: false,
      stdin: "ignore",
      timeout: VERSION_TIMEOUT_MS,
    });
    if (result.failed) return null;
    const line = text(result.stdout).trim().split("\n")[0];
    return line ? line.trim() : null;
  },
};
