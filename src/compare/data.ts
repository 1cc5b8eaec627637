/**
 * Data comparison: shape first, then element by element
 */

import {
  isIntegerArray,
  type ArtifactUnit,
  type ColumnValues,
  type IntegerArray,
  type NumericValues,
  type TableData,
  type UnitData,
} from "../artifacts/types.js";
import type { DataDiff, Tolerance, ValueDiffSummary } from "./types.js";

function emptySummary(): ValueDiffSummary {
  return { total: 0, differing: 0, maxAbsolute: 0, maxRelative: 0 };
}

function record(summary: ValueDiffSummary, deviation: number, magnitude: number): void {
  summary.differing++;
  summary.maxAbsolute = Math.max(summary.maxAbsolute, deviation);
  if (magnitude !== 0) {
    summary.maxRelative = Math.max(summary.maxRelative, deviation / magnitude);
  }
}

/**
 * Compare exact 64-bit integers. Equality is decided on the integers;
 * only the deviation checked against the tolerance is a double.
 */
export function compareIntegers(
  reference: IntegerArray,
  candidate: IntegerArray,
  tolerance: Tolerance,
): ValueDiffSummary {
  const summary = emptySummary();
  summary.total = reference.length;

  for (let i = 0; i < reference.length; i++) {
    const a = reference[i];
    const b = candidate[i];
    if (a === undefined || b === undefined) {
      summary.differing++;
      continue;
    }
    if (a === b) continue;

    const deviation = Number(a > b ? a - b : b - a);
    const magnitude = Math.abs(Number(a));
    if (deviation <= tolerance.absolute + tolerance.relative * magnitude) continue;
    record(summary, deviation, magnitude);
  }

  return summary;
}

function asDoubles(values: NumericValues): ArrayLike<number> {
  return isIntegerArray(values) ? Float64Array.from(values, (value) => Number(value)) : values;
}

/**
 * Compare two numeric sequences of equal length.
 * NaN in the same position on both sides is equal; any other NaN pairing differs.
 */
export function compareNumbers(
  referenceValues: NumericValues,
  candidateValues: NumericValues,
  tolerance: Tolerance,
): ValueDiffSummary {
  if (isIntegerArray(referenceValues) && isIntegerArray(candidateValues)) {
    return compareIntegers(referenceValues, candidateValues, tolerance);
  }
  const reference = asDoubles(referenceValues);
  const candidate = asDoubles(candidateValues);

  const summary = emptySummary();
  summary.total = reference.length;

  for (let i = 0; i < reference.length; i++) {
    const a = reference[i] ?? Number.NaN;
    const b = candidate[i] ?? Number.NaN;

    const aNaN = Number.isNaN(a);
    const bNaN = Number.isNaN(b);
    if (aNaN || bNaN) {
      if (!(aNaN && bNaN)) summary.differing++;
      continue;
    }
    if (a === b) continue;

    // Unequal infinities never fall within a tolerance
    if (!Number.isFinite(a) || !Number.isFinite(b)) {
      summary.differing++;
      continue;
    }

    const deviation = Math.abs(a - b);
    if (deviation <= tolerance.absolute + tolerance.relative * Math.abs(a)) continue;
    record(summary, deviation, Math.abs(a));
  }

  return summary;
}

export function compareStrings(reference: string[], candidate: string[]): ValueDiffSummary {
  const summary = emptySummary();
  summary.total = reference.length;
  reference.forEach((value, i) => {
    if (value !== candidate[i]) summary.differing++;
  });
  return summary;
}

function columnLength(data: ColumnValues): number {
  return data.values.length;
}

/**
 * Human-readable shape of a unit's data, also used as its layout signature
 */
export function describeShape(unit: ArtifactUnit): string {
  const data = unit.data;
  if (data === null) return unit.kind === "empty" ? "empty" : `${unit.kind} (no data)`;
  if (data.type === "array") {
    return `${unit.kind}[${data.shape.join(", ")}]`;
  }
  const columns = data.columns.map(
    (column) => `${column.name}:${column.data.type}:${columnLength(column.data)}`,
  );
  return `table[${data.rows} rows; ${columns.join(", ")}]`;
}

function merge(into: ValueDiffSummary, from: ValueDiffSummary): void {
  into.total += from.total;
  into.differing += from.differing;
  into.maxAbsolute = Math.max(into.maxAbsolute, from.maxAbsolute);
  into.maxRelative = Math.max(into.maxRelative, from.maxRelative);
}

function compareTables(
  reference: TableData,
  candidate: TableData,
  tolerance: Tolerance,
): DataDiff | null {
  const total = emptySummary();
  const columns: Record<string, ValueDiffSummary> = {};

  reference.columns.forEach((refColumn, c) => {
    const candColumn = candidate.columns[c];
    if (!candColumn) return;
    const summary =
      refColumn.data.type === "numeric" && candColumn.data.type === "numeric"
        ? compareNumbers(refColumn.data.values, candColumn.data.values, tolerance)
        : refColumn.data.type === "string" && candColumn.data.type === "string"
          ? compareStrings(refColumn.data.values, candColumn.data.values)
          : emptySummary();
    merge(total, summary);
    if (summary.differing > 0) {
      columns[refColumn.name] = summary;
    }
  });

  return total.differing === 0 ? null : { kind: "values", ...total, columns };
}

/**
 * Compare the data of two units that share an identifier.
 * A shape (or layout) mismatch short-circuits the element comparison.
 */
export function compareUnitData(
  reference: ArtifactUnit,
  candidate: ArtifactUnit,
  tolerance: Tolerance,
): DataDiff | null {
  const referenceShape = describeShape(reference);
  const candidateShape = describeShape(candidate);
  if (referenceShape !== candidateShape) {
    return { kind: "shape-mismatch", referenceShape, candidateShape };
  }

  const a: UnitData | null = reference.data;
  const b: UnitData | null = candidate.data;
  if (a === null || b === null) {
    return null;
  }

  if (a.type === "array" && b.type === "array") {
    const summary = compareNumbers(a.values, b.values, tolerance);
    return summary.differing === 0 ? null : { kind: "values", ...summary };
  }
  if (a.type === "table" && b.type === "table") {
    return compareTables(a, b, tolerance);
  }
  return { kind: "shape-mismatch", referenceShape, candidateShape };
}
