/**
 * Run aggregation: collects case results as they arrive, keeps running
 * counts and produces the final report in discovery order.
 */

import type { CaseResult, RunCounts, RunMode, RunReport, TreeSummary } from "./types.js";

export interface FinalizeOptions {
  aborted?: boolean;
  tree?: TreeSummary;
}

export class RunAggregator {
  private readonly results = new Map<string, CaseResult>();
  private readonly counts: RunCounts = { pass: 0, fail: 0, error: 0, total: 0 };
  private readonly startedAt = new Date();
  private readonly start = performance.now();

  constructor(readonly mode: RunMode) {}

  /**
   * Record a result. A second result for the same case replaces the first
   * and the case is still counted once.
   */
  add(result: CaseResult): void {
    const previous = this.results.get(result.caseId);
    if (previous) {
      this.counts[previous.verdict]--;
    } else {
      this.counts.total++;
    }
    this.counts[result.verdict]++;
    this.results.set(result.caseId, result);
  }

  has(caseId: string): boolean {
    return this.results.has(caseId);
  }

  snapshot(): RunCounts {
    return { ...this.counts };
  }

  finalize(options: FinalizeOptions = {}): RunReport {
    const cases = [...this.results.values()].sort((a, b) => a.index - b.index);
    const report: RunReport = {
      mode: this.mode,
      cases,
      counts: this.snapshot(),
      aborted: options.aborted ?? false,
      startedAt: this.startedAt.toISOString(),
      durationMs: performance.now() - this.start,
    };
    if (options.tree) report.tree = options.tree;
    return report;
  }

  /**
   * Drain a result stream into a report
   */
  static async aggregate(
    stream: AsyncIterable<CaseResult> | Iterable<CaseResult>,
    mode: RunMode,
    options: FinalizeOptions = {},
  ): Promise<RunReport> {
    const aggregator = new RunAggregator(mode);
    for await (const result of stream) {
      aggregator.add(result);
    }
    return aggregator.finalize(options);
  }
}

/**
 * True when every case passed
 */
export function isCleanRun(report: RunReport): boolean {
  return !report.aborted && report.counts.fail === 0 && report.counts.error === 0;
}
