/**
 * Text rendering of run reports
 */

import { formatArtifactDiff } from "../compare/format.js";
import type { CaseResult, RunReport, SuffixCounts } from "./types.js";

export interface ReportFormatOptions {
  /** Include passing cases and identical artifacts */
  verbose?: boolean;
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

function formatCase(result: CaseResult, verbose: boolean): string[] {
  const lines = [`[${result.verdict.toUpperCase()}] ${result.caseId}`];
  const { outcome } = result;

  if (outcome && outcome.status !== "success") {
    const code = outcome.exitCode === null ? "" : ` (exit ${outcome.exitCode})`;
    lines.push(`  execution: ${outcome.status}${code}`);
    if (outcome.error) lines.push(`  ${outcome.error}`);
    if (outcome.stderrTail) lines.push(indent(outcome.stderrTail, "  | "));
    if (outcome.logFile) lines.push(`  log: ${outcome.logFile}`);
  }
  for (const file of result.missingArtifacts) lines.push(`  missing: ${file}`);
  for (const file of result.unexpectedArtifacts) lines.push(`  unexpected: ${file}`);
  for (const message of result.errors) lines.push(`  error: ${message}`);
  for (const diff of result.diffs) {
    if (verbose || diff.verdict !== "identical") {
      lines.push(indent(formatArtifactDiff(diff), "  "));
    }
  }
  return lines;
}

function formatSuffixCounts(label: string, counts: SuffixCounts): string {
  const breakdown = Object.entries(counts.bySuffix)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([suffix, n]) => `${suffix} ${n}`)
    .join(", ");
  return breakdown ? `${label}: ${counts.total} (${breakdown})` : `${label}: ${counts.total}`;
}

/**
 * One-line totals, e.g. `12 cases: 10 passed, 1 failed, 1 errors`
 */
export function formatCounts(report: RunReport): string {
  const { total, pass, fail, error } = report.counts;
  const suffix = report.aborted ? " (aborted)" : "";
  return `${total} cases: ${pass} passed, ${fail} failed, ${error} errors${suffix}`;
}

/**
 * Render a report: non-passing cases in discovery order, the tree summary
 * when present and the totals line last
 */
export function formatRunReport(report: RunReport, options: ReportFormatOptions = {}): string {
  const verbose = options.verbose ?? false;
  const lines: string[] = [];

  for (const result of report.cases) {
    if (verbose || result.verdict !== "pass") {
      lines.push(...formatCase(result, verbose));
    }
  }

  if (report.tree) {
    if (lines.length > 0) lines.push("");
    lines.push(
      formatSuffixCounts("Files differing", report.tree.differing),
      formatSuffixCounts("Reference only", report.tree.referenceOnly),
      formatSuffixCounts("Candidate only", report.tree.candidateOnly),
    );
  }

  if (lines.length > 0) lines.push("");
  lines.push(formatCounts(report));
  return lines.join("\n");
}
