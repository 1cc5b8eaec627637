/**
 * Tests for data comparison
 */

import { describe, it, expect } from "vitest";
import {
  compareIntegers,
  compareNumbers,
  compareStrings,
  compareUnitData,
  describeShape,
} from "./data.js";
import { EXACT } from "./types.js";
import type { ArtifactUnit, TableData, UnitData } from "../artifacts/types.js";

function unit(data: UnitData | null, kind: ArtifactUnit["kind"] = "image"): ArtifactUnit {
  return { id: "SCI,1", index: 1, kind, header: new Map(), data };
}

function image(values: number[], shape: number[] = [values.length]): UnitData {
  return { type: "array", shape, values };
}

function table(time: number[], labels: string[]): TableData {
  return {
    type: "table",
    rows: time.length,
    columns: [
      { name: "TIME", format: "1D", repeat: 1, data: { type: "numeric", values: time } },
      { name: "LABEL", format: "8A", repeat: 8, data: { type: "string", values: labels } },
    ],
  };
}

describe("compareNumbers", () => {
  it("should count differing elements and track the largest deviations", () => {
    const summary = compareNumbers([1, 2, 4, 0], [1, 2.5, 3, 0.25], EXACT);

    expect(summary).toEqual({ total: 4, differing: 3, maxAbsolute: 1, maxRelative: 0.25 });
  });

  it("should accept deviations within tolerance", () => {
    const tolerance = { absolute: 0.1, relative: 0.01 };

    // 100 vs 101: 1 <= 0.1 + 1; 1 vs 1.2: 0.2 > 0.1 + 0.01
    expect(compareNumbers([100, 1], [101, 1.2], tolerance).differing).toBe(1);
  });

  it("should treat NaN in the same position as equal", () => {
    expect(compareNumbers([Number.NaN, 1], [Number.NaN, 1], EXACT).differing).toBe(0);
    expect(compareNumbers([Number.NaN, 1], [0, Number.NaN], EXACT).differing).toBe(2);
  });

  it("should never tolerate unequal infinities", () => {
    const summary = compareNumbers(
      [Infinity, -Infinity, Infinity],
      [Infinity, Infinity, 5],
      { absolute: 1e300, relative: 1 },
    );

    expect(summary.differing).toBe(2);
    expect(summary.maxAbsolute).toBe(0);
  });
});

describe("compareIntegers", () => {
  it("should tell apart integers a double cannot", () => {
    const summary = compareIntegers(
      BigInt64Array.from([9007199254740992n, 5n]),
      BigInt64Array.from([9007199254740993n, 5n]),
      EXACT,
    );

    expect(summary).toEqual({ total: 2, differing: 1, maxAbsolute: 1, maxRelative: 2 ** -53 });
  });

  it("should accept deviations within tolerance", () => {
    const tolerance = { absolute: 1, relative: 0 };

    expect(compareIntegers(BigInt64Array.from([100n]), BigInt64Array.from([101n]), tolerance))
      .toEqual({ total: 1, differing: 0, maxAbsolute: 0, maxRelative: 0 });
  });

  it("should be reached from compareNumbers when both sides are exact", () => {
    const summary = compareNumbers(
      BigUint64Array.from([18446744073709551615n]),
      BigUint64Array.from([18446744073709551614n]),
      EXACT,
    );

    expect(summary.differing).toBe(1);
    expect(summary.maxAbsolute).toBe(1);
  });

  it("should compare exact integers against doubles as doubles", () => {
    expect(compareNumbers(BigInt64Array.from([3n]), [3], EXACT).differing).toBe(0);
    expect(compareNumbers([2], BigInt64Array.from([3n]), EXACT).differing).toBe(1);
  });
});

describe("compareStrings", () => {
  it("should compare position by position", () => {
    expect(compareStrings(["a", "b", "c"], ["a", "x", "c"])).toEqual({
      total: 3,
      differing: 1,
      maxAbsolute: 0,
      maxRelative: 0,
    });
  });
});

describe("describeShape", () => {
  it("should describe arrays, tables and empty units", () => {
    expect(describeShape(unit(image([1, 2, 3, 4, 5, 6], [3, 2])))).toBe("image[3, 2]");
    expect(describeShape(unit(table([1, 2], ["a", "b"]), "table"))).toBe(
      "table[2 rows; TIME:numeric:2, LABEL:string:2]",
    );
    expect(describeShape(unit(null, "empty"))).toBe("empty");
  });
});

describe("compareUnitData", () => {
  it("should return null for equal arrays", () => {
    expect(compareUnitData(unit(image([1, 2])), unit(image([1, 2])), EXACT)).toBeNull();
  });

  it("should summarise differing arrays", () => {
    expect(compareUnitData(unit(image([1, 2])), unit(image([1, 3])), EXACT)).toEqual({
      kind: "values",
      total: 2,
      differing: 1,
      maxAbsolute: 1,
      maxRelative: 0.5,
    });
  });

  it("should short-circuit on a shape mismatch", () => {
    expect(compareUnitData(unit(image([1, 2])), unit(image([1, 2, 3])), EXACT)).toEqual({
      kind: "shape-mismatch",
      referenceShape: "image[2]",
      candidateShape: "image[3]",
    });
  });

  it("should report a unit that gained data", () => {
    expect(compareUnitData(unit(null, "empty"), unit(image([1])), EXACT)).toEqual({
      kind: "shape-mismatch",
      referenceShape: "empty",
      candidateShape: "image[1]",
    });
  });

  it("should treat two empty units as equal", () => {
    expect(compareUnitData(unit(null, "empty"), unit(null, "empty"), EXACT)).toBeNull();
  });

  it("should break table differences down by column", () => {
    const diff = compareUnitData(
      unit(table([1, 2], ["a", "b"]), "table"),
      unit(table([1, 4], ["a", "c"]), "table"),
      EXACT,
    );

    expect(diff).toEqual({
      kind: "values",
      total: 4,
      differing: 2,
      maxAbsolute: 2,
      maxRelative: 1,
      columns: {
        TIME: { total: 2, differing: 1, maxAbsolute: 2, maxRelative: 1 },
        LABEL: { total: 2, differing: 1, maxAbsolute: 0, maxRelative: 0 },
      },
    });
  });
});
