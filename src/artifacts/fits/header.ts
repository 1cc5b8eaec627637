/**
 * FITS header cards
 *
 * A header is a run of 80-character ASCII cards packed into 2880-byte blocks
 * and terminated by an END card.
 */

import {
  bigintValue,
  booleanValue,
  numberValue,
  stringValue,
  type Header,
  type MetadataValue,
} from "../types.js";

export const BLOCK_SIZE = 2880;
export const CARD_SIZE = 80;
const CARDS_PER_BLOCK = BLOCK_SIZE / CARD_SIZE;

/** Keywords whose cards may repeat; their text is joined with newlines */
export const COMMENTARY_KEYWORDS = new Set(["COMMENT", "HISTORY"]);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([EeDd][+-]?\d+)?$/;

export interface ParsedHeader {
  header: Header;
  /** Byte offset of the first byte after the header's last block */
  dataOffset: number;
}

/**
 * Round a byte count up to a whole number of blocks
 */
export function padToBlock(bytes: number): number {
  return Math.ceil(bytes / BLOCK_SIZE) * BLOCK_SIZE;
}

/**
 * Parse the quoted string at the start of `text`.
 * Returns the string (trailing blanks removed) and the text after the closing quote.
 */
function parseQuoted(text: string): { value: string; rest: string } {
  let value = "";
  let i = 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "'") {
      if (text[i + 1] === "'") {
        value += "'";
        i += 2;
        continue;
      }
      return { value: value.trimEnd(), rest: text.slice(i + 1) };
    }
    value += ch;
    i++;
  }
  throw new Error(`Unterminated string value: ${text.trim()}`);
}

/**
 * Parse the value field of a card (everything after "= ")
 */
export function parseValue(field: string): MetadataValue {
  const text = field.trimStart();
  if (text.startsWith("'")) {
    return stringValue(parseQuoted(text).value);
  }

  const slash = text.indexOf("/");
  const token = (slash >= 0 ? text.slice(0, slash) : text).trim();

  if (token === "T") return booleanValue(true);
  if (token === "F") return booleanValue(false);
  if (INTEGER_PATTERN.test(token)) {
    const n = Number.parseInt(token, 10);
    return Number.isSafeInteger(n) ? numberValue(n) : bigintValue(BigInt(token));
  }
  if (FLOAT_PATTERN.test(token)) return numberValue(Number(token.replace(/[Dd]/, "E")));
  // Complex values and undefined (blank) values are kept verbatim
  return stringValue(token);
}

/**
 * Parse a header starting at `offset`
 */
export function parseHeader(buffer: Uint8Array, offset: number): ParsedHeader {
  const header: Header = new Map();
  const decoder = new TextDecoder("latin1");
  let lastString: string | null = null;
  let position = offset;

  while (position + BLOCK_SIZE <= buffer.length) {
    const block = decoder.decode(buffer.subarray(position, position + BLOCK_SIZE));
    position += BLOCK_SIZE;

    for (let c = 0; c < CARDS_PER_BLOCK; c++) {
      const card = block.slice(c * CARD_SIZE, (c + 1) * CARD_SIZE);
      const keyword = card.slice(0, 8).trimEnd();

      if (keyword === "END") {
        return { header, dataOffset: position };
      }
      if (keyword === "") {
        continue;
      }

      if (keyword === "CONTINUE" && lastString !== null) {
        const previous = header.get(lastString);
        const next = parseValue(card.slice(8));
        if (previous?.type === "string" && next.type === "string") {
          header.set(lastString, stringValue(previous.value.replace(/&$/, "") + next.value));
        }
        continue;
      }
      lastString = null;

      if (keyword === "HIERARCH") {
        const eq = card.indexOf("=");
        if (eq > 0) {
          const key = `HIERARCH ${card.slice(9, eq).trim()}`;
          header.set(key, parseValue(card.slice(eq + 1)));
          continue;
        }
      }

      if (card.slice(8, 10) === "= " && !COMMENTARY_KEYWORDS.has(keyword)) {
        const value = parseValue(card.slice(10));
        header.set(keyword, value);
        if (value.type === "string" && value.value.endsWith("&")) {
          lastString = keyword;
        }
        continue;
      }

      // Commentary card: COMMENT, HISTORY or any keyword without a value indicator
      const text = card.slice(8).trimEnd();
      const existing = header.get(keyword);
      header.set(
        keyword,
        stringValue(existing?.type === "string" ? `${existing.value}\n${text}` : text),
      );
    }
  }

  throw new Error(`Header starting at byte ${offset} has no END card`);
}

/**
 * Read a keyword that must be a number
 */
export function numberKeyword(header: Header, keyword: string, fallback?: number): number {
  const value = header.get(keyword);
  if (value?.type === "number") return value.value;
  if (value?.type === "bigint") {
    throw new Error(`Keyword ${keyword} is too large: ${value.value}`);
  }
  if (value === undefined && fallback !== undefined) return fallback;
  throw new Error(`Keyword ${keyword} is missing or not numeric`);
}

/**
 * Read a scaling keyword (BSCALE, BZERO, TSCALn, TZEROn); integers too large
 * for a double are rounded
 */
export function scalingKeyword(header: Header, keyword: string, fallback: number): number {
  const value = header.get(keyword);
  return value?.type === "bigint" ? Number(value.value) : numberKeyword(header, keyword, fallback);
}

/**
 * Read an integer keyword exactly; undefined when missing or not an integer
 */
export function integerKeyword(header: Header, keyword: string): bigint | undefined {
  const value = header.get(keyword);
  if (value?.type === "bigint") return value.value;
  if (value?.type === "number" && Number.isInteger(value.value)) return BigInt(value.value);
  return undefined;
}

/**
 * Read a keyword that must be a string
 */
export function stringKeyword(header: Header, keyword: string): string | undefined {
  const value = header.get(keyword);
  return value?.type === "string" ? value.value : undefined;
}

/**
 * Format one header card
 */
export function formatCard(keyword: string, value: MetadataValue): string {
  const key = keyword.padEnd(8).slice(0, 8);
  let field: string;
  switch (value.type) {
    case "string":
      field = `'${value.value.replace(/'/g, "''").padEnd(8)}'`;
      break;
    case "boolean":
      field = (value.value ? "T" : "F").padStart(20);
      break;
    case "number":
      if (!Number.isFinite(value.value)) {
        throw new Error(`Keyword ${keyword} has a non-finite value`);
      }
      field = String(value.value).toUpperCase().padStart(20);
      break;
    case "bigint":
      field = String(value.value).padStart(20);
      break;
  }
  const card = `${key}= ${field}`;
  if (card.length > CARD_SIZE) {
    throw new Error(`Card for ${keyword} exceeds ${CARD_SIZE} characters`);
  }
  return card.padEnd(CARD_SIZE);
}

/**
 * Format a commentary card (COMMENT, HISTORY)
 */
export function formatCommentaryCard(keyword: string, text: string): string {
  return `${keyword.padEnd(8)}${text}`.slice(0, CARD_SIZE).padEnd(CARD_SIZE);
}

/**
 * Join cards into whole blocks, appending the END card
 */
export function encodeHeader(cards: string[]): Uint8Array {
  const text = [...cards, "END".padEnd(CARD_SIZE)].join("");
  const bytes = new Uint8Array(padToBlock(text.length)).fill(0x20);
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i) & 0xff;
  }
  return bytes;
}
