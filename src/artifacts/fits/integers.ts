/**
 * Exact decoding of 64-bit integer data (BITPIX 64 images, K columns)
 */

import type { Header, IntegerArray } from "../types.js";
import { integerKeyword } from "./header.js";

/** Zero point marking unsigned 64-bit integers stored as signed ones */
export const UNSIGNED_ZERO = 2n ** 63n;

export type IntegerKind = "signed" | "unsigned";

/**
 * Whether the scaling keywords leave 64-bit integers exact: signed without
 * scaling, unsigned under the conventional zero point, null for anything else
 */
export function exactIntegerKind(
  header: Header,
  scaleKeyword: string,
  zeroKeyword: string,
): IntegerKind | null {
  const scale = header.get(scaleKeyword);
  if (scale !== undefined && !(scale.type === "number" && scale.value === 1)) return null;
  if (!header.has(zeroKeyword)) return "signed";
  const zero = integerKeyword(header, zeroKeyword);
  if (zero === 0n) return "signed";
  if (zero === UNSIGNED_ZERO) return "unsigned";
  return null;
}

/**
 * Read `count` big-endian signed 64-bit integers starting at `offset`
 */
export function readIntegers(view: DataView, offset: number, count: number): bigint[] {
  const out: bigint[] = [];
  for (let i = 0; i < count; i++) {
    out.push(view.getBigInt64(offset + i * 8));
  }
  return out;
}

export function toIntegerArray(raw: bigint[], kind: IntegerKind): IntegerArray {
  return kind === "signed"
    ? BigInt64Array.from(raw)
    : BigUint64Array.from(raw, (value) => value + UNSIGNED_ZERO);
}
