/**
 * Header selectors: `KEYWORD=value` terms joined by `and` / `or`,
 * evaluated left to right against a primary input's header.
 */

import type { Header, MetadataValue } from "../artifacts/types.js";
import { ValidationError } from "../utils/errors.js";

export interface SelectorTerm {
  keyword: string;
  value: string;
}

export type SelectorOperator = "and" | "or";

export interface Selector {
  first: SelectorTerm;
  rest: { operator: SelectorOperator; term: SelectorTerm }[];
}

const TERM = /^([^=\s]+)\s*=\s*(.*)$/;

function parseTerm(text: string): SelectorTerm {
  const match = TERM.exec(text.trim());
  if (!match?.[1] || match[2] === undefined || match[2].trim() === "") {
    throw new ValidationError(`Invalid selector term "${text.trim()}": expected KEYWORD=value`, {
      field: "selector",
    });
  }
  return { keyword: match[1].toUpperCase(), value: match[2].trim() };
}

function parseOperator(text: string): SelectorOperator {
  const op = text.toLowerCase();
  if (op !== "and" && op !== "or") {
    throw new ValidationError(`Invalid selector operator "${text}": expected and/or`, {
      field: "selector",
    });
  }
  return op;
}

/**
 * Parse an expression such as `INSTRUME=WFC3 and PCTECORR=PERFORM`
 */
export function parseSelector(expression: string): Selector {
  const parts = expression.trim().split(/\s+(and|or)\s+/i);
  const [head, ...tail] = parts;
  if (head === undefined || head.trim() === "") {
    throw new ValidationError("Empty selector", { field: "selector" });
  }

  const selector: Selector = { first: parseTerm(head), rest: [] };
  for (let i = 0; i < tail.length; i += 2) {
    const operator = tail[i];
    const term = tail[i + 1];
    if (operator === undefined || term === undefined) {
      throw new ValidationError(`Dangling operator in selector "${expression}"`, {
        field: "selector",
      });
    }
    selector.rest.push({ operator: parseOperator(operator), term: parseTerm(term) });
  }
  return selector;
}

/**
 * Build a selector from positional triples: keyword value [op keyword value]...
 */
export function selectorFromArgs(args: string[]): Selector {
  const [keyword, value, ...tail] = args;
  if (keyword === undefined || value === undefined || tail.length % 3 !== 0) {
    throw new ValidationError(
      "Expected <keyword> <value> followed by zero or more <and|or> <keyword> <value> triples",
      { field: "selector" },
    );
  }

  const selector: Selector = { first: parseTerm(`${keyword}=${value}`), rest: [] };
  for (let i = 0; i < tail.length; i += 3) {
    selector.rest.push({
      operator: parseOperator(tail[i] ?? ""),
      term: parseTerm(`${tail[i + 1] ?? ""}=${tail[i + 2] ?? ""}`),
    });
  }
  return selector;
}

function parseLogical(text: string): boolean | undefined {
  const lower = text.toLowerCase();
  if (lower === "t" || lower === "true") return true;
  if (lower === "f" || lower === "false") return false;
  return undefined;
}

/**
 * Whether a header value satisfies a term's value; comparison is case-insensitive
 */
export function valueMatches(found: MetadataValue | undefined, expected: string): boolean {
  if (found === undefined) return false;
  switch (found.type) {
    case "boolean":
      return parseLogical(expected) === found.value;
    case "number": {
      const n = Number(expected);
      return !Number.isNaN(n) && n === found.value;
    }
    case "bigint":
      return /^[+-]?\d+$/.test(expected.trim()) && BigInt(expected.trim()) === found.value;
    case "string":
      return found.value.trim().toLowerCase() === expected.toLowerCase();
  }
}

export function matchesSelector(selector: Selector, header: Header): boolean {
  const test = (term: SelectorTerm) => valueMatches(header.get(term.keyword), term.value);
  let result = test(selector.first);
  for (const { operator, term } of selector.rest) {
    result = operator === "and" ? result && test(term) : result || test(term);
  }
  return result;
}

/**
 * Keywords a selector reads
 */
export function selectorKeywords(selector: Selector): string[] {
  return [selector.first.keyword, ...selector.rest.map((r) => r.term.keyword)];
}

export function formatSelector(selector: Selector): string {
  const terms = [`${selector.first.keyword}=${selector.first.value}`];
  for (const { operator, term } of selector.rest) {
    terms.push(operator, `${term.keyword}=${term.value}`);
  }
  return terms.join(" ");
}
