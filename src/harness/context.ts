/**
 * Per-run state shared by discovery, dispatch and comparison
 */

import type { Logger, ILogObj } from "tslog";
import { DEFAULT_COMPARISON, type ComparisonOptions } from "../compare/types.js";
import { createSilentLogger } from "../utils/logger.js";

export interface RunProgress {
  discovered: number;
  dispatched: number;
  completed: number;
}

export interface RunContext {
  logger: Logger<ILogObj>;
  /** Aborted on user cancellation; stops discovery pulls and terminates running children */
  readonly signal: AbortSignal;
  abort(reason?: unknown): void;
  progress: RunProgress;
  comparison: ComparisonOptions;
}

export interface RunContextOptions {
  logger?: Logger<ILogObj>;
  /** External signal (for example wired to SIGINT) that also aborts the run */
  signal?: AbortSignal;
  comparison?: Partial<ComparisonOptions>;
}

export function createRunContext(options: RunContextOptions = {}): RunContext {
  const controller = new AbortController();
  const external = options.signal;
  if (external) {
    if (external.aborted) {
      controller.abort(external.reason);
    } else {
      external.addEventListener("abort", () => controller.abort(external.reason), { once: true });
    }
  }

  return {
    logger: options.logger ?? createSilentLogger(),
    signal: controller.signal,
    abort: (reason?: unknown) => controller.abort(reason),
    progress: { discovered: 0, dispatched: 0, completed: 0 },
    comparison: { ...DEFAULT_COMPARISON, ...options.comparison },
  };
}
