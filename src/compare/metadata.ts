/**
 * Header comparison: key union with added/removed/changed classification
 */

import type { Header, MetadataValue } from "../artifacts/types.js";
import type { MetadataDiffEntry } from "./types.js";

/**
 * Compile keyword patterns; `*` matches any run of characters, case-insensitive
 */
export function keywordMatcher(patterns: string[]): (keyword: string) => boolean {
  const regexes = patterns.map((pattern) => {
    const source = pattern
      .replace(/[.+?^${}()|[\]\\]/g, "\\$&")
      .replace(/\*/g, ".*");
    return new RegExp(`^${source}$`, "i");
  });
  return (keyword) => regexes.some((regex) => regex.test(keyword));
}

/**
 * Tagged values are equal when both type and value agree
 */
export function metadataEqual(a: MetadataValue, b: MetadataValue): boolean {
  if (a.type !== b.type) return false;
  if (a.type === "number" && b.type === "number") {
    return a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value));
  }
  return a.value === b.value;
}

/**
 * Compare two headers field by field.
 * Entries follow the reference's keyword order, then keywords only the candidate has.
 */
export function compareHeaders(
  reference: Header,
  candidate: Header,
  ignore: (keyword: string) => boolean = () => false,
): MetadataDiffEntry[] {
  const entries: MetadataDiffEntry[] = [];
  const keys = new Set([...reference.keys(), ...candidate.keys()]);

  for (const keyword of keys) {
    if (ignore(keyword)) continue;

    const oldValue = reference.get(keyword);
    const newValue = candidate.get(keyword);

    if (oldValue === undefined && newValue !== undefined) {
      entries.push({ keyword, operation: "added", newValue });
    } else if (oldValue !== undefined && newValue === undefined) {
      entries.push({ keyword, operation: "removed", oldValue });
    } else if (oldValue !== undefined && newValue !== undefined && !metadataEqual(oldValue, newValue)) {
      entries.push({ keyword, operation: "changed", oldValue, newValue });
    }
  }

  return entries;
}
