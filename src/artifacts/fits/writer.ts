/**
 * FITS writer
 *
 * Encodes images and binary tables. Used to build reference fixtures and
 * small synthetic inputs; it writes only what the reader decodes.
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
  bigintValue,
  booleanValue,
  numberValue,
  stringValue,
  type MetadataValue,
  type NumericValues,
} from "../types.js";
import {
  COMMENTARY_KEYWORDS,
  encodeHeader,
  formatCard,
  formatCommentaryCard,
  padToBlock,
} from "./header.js";
import { binaryFieldWidth, parseBinaryForm } from "./table.js";

export type CardValue = string | number | bigint | boolean;

export interface ImageSpec {
  type: "image";
  bitpix: 8 | 16 | 32 | 64 | -32 | -64;
  /** NAXIS1 first */
  shape: number[];
  values: NumericValues;
}

export interface ColumnSpec {
  name: string;
  /** Fixed-width binary format: L B I J K E D or nA, with optional repeat */
  format: string;
  values: NumericValues | string[];
}

export interface TableSpec {
  type: "table";
  columns: ColumnSpec[];
}

export interface UnitSpec {
  /** Extension name; ignored for the primary unit */
  name?: string;
  version?: number;
  /** Extra cards, written after the mandatory ones in insertion order */
  header?: Record<string, CardValue>;
  data?: ImageSpec | TableSpec;
}

function toMetadata(value: CardValue): MetadataValue {
  if (typeof value === "string") return stringValue(value);
  if (typeof value === "boolean") return booleanValue(value);
  if (typeof value === "bigint") return bigintValue(value);
  return numberValue(value);
}

function userCards(header: Record<string, CardValue> | undefined): string[] {
  const cards: string[] = [];
  for (const [keyword, value] of Object.entries(header ?? {})) {
    if (COMMENTARY_KEYWORDS.has(keyword)) {
      for (const line of String(value).split("\n")) {
        cards.push(formatCommentaryCard(keyword, line));
      }
    } else {
      cards.push(formatCard(keyword, toMetadata(value)));
    }
  }
  return cards;
}

function writeElement(
  view: DataView,
  offset: number,
  bitpix: number,
  element: number | bigint,
): void {
  if (bitpix === 64) {
    view.setBigInt64(offset, typeof element === "bigint" ? element : BigInt(Math.trunc(element)));
    return;
  }
  const value = Number(element);
  switch (bitpix) {
    case 8:
      view.setUint8(offset, value);
      break;
    case 16:
      view.setInt16(offset, value);
      break;
    case 32:
      view.setInt32(offset, value);
      break;
    case -32:
      view.setFloat32(offset, value);
      break;
    case -64:
      view.setFloat64(offset, value);
      break;
    default:
      throw new Error(`Unsupported BITPIX ${bitpix}`);
  }
}

function encodeImage(image: ImageSpec): Uint8Array {
  const width = Math.abs(image.bitpix) / 8;
  const count = image.shape.reduce((product, n) => product * n, 1);
  if (image.values.length !== count) {
    throw new Error(`Image has ${image.values.length} values for shape [${image.shape.join(", ")}]`);
  }
  const bytes = new Uint8Array(padToBlock(count * width));
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < count; i++) {
    writeElement(view, i * width, image.bitpix, image.values[i] ?? 0);
  }
  return bytes;
}

const TABLE_BITPIX: Record<string, number> = { B: 8, I: 16, J: 32, K: 64, E: -32, D: -64 };

function encodeTable(table: TableSpec): { cards: string[]; data: Uint8Array } {
  const forms = table.columns.map((column) => parseBinaryForm(column.format));
  const widths = forms.map(binaryFieldWidth);
  const rowBytes = widths.reduce((sum, w) => sum + w, 0);
  const first = table.columns[0];
  const firstForm = forms[0];
  let rows = 0;
  if (first && firstForm) {
    rows = firstForm.code === "A" ? first.values.length : first.values.length / firstForm.repeat;
  }

  const cards = [
    formatCard("BITPIX", numberValue(8)),
    formatCard("NAXIS", numberValue(2)),
    formatCard("NAXIS1", numberValue(rowBytes)),
    formatCard("NAXIS2", numberValue(rows)),
    formatCard("PCOUNT", numberValue(0)),
    formatCard("GCOUNT", numberValue(1)),
    formatCard("TFIELDS", numberValue(table.columns.length)),
  ];

  const data = new Uint8Array(padToBlock(rowBytes * rows));
  const view = new DataView(data.buffer);
  let fieldOffset = 0;

  table.columns.forEach((column, c) => {
    const form = forms[c];
    const width = widths[c] ?? 0;
    if (!form) return;
    cards.push(formatCard(`TTYPE${c + 1}`, stringValue(column.name)));
    cards.push(formatCard(`TFORM${c + 1}`, stringValue(column.format)));

    for (let r = 0; r < rows; r++) {
      const cell = r * rowBytes + fieldOffset;
      if (form.code === "A") {
        const text = String(column.values[r] ?? "");
        for (let i = 0; i < form.repeat; i++) {
          data[cell + i] = i < text.length ? text.charCodeAt(i) & 0xff : 0x20;
        }
        continue;
      }
      for (let i = 0; i < form.repeat; i++) {
        const element = column.values[r * form.repeat + i] ?? 0;
        const value = typeof element === "string" ? Number(element) : element;
        if (form.code === "L") {
          data[cell + i] = Number.isNaN(Number(value)) ? 0 : value ? 0x54 : 0x46;
          continue;
        }
        const bitpix = TABLE_BITPIX[form.code];
        if (bitpix === undefined) {
          throw new Error(`Cannot write column format ${column.format}`);
        }
        writeElement(view, cell + i * (Math.abs(bitpix) / 8), bitpix, value);
      }
    }
    fieldOffset += width;
  });

  return { cards, data };
}

/**
 * Encode units into FITS bytes; the first unit becomes the primary HDU
 */
export function encodeFits(units: UnitSpec[]): Uint8Array {
  const parts: Uint8Array[] = [];

  units.forEach((unit, index) => {
    const cards: string[] = [];
    let data: Uint8Array = new Uint8Array(0);

    if (index === 0) {
      if (unit.data?.type === "table") {
        throw new Error("The primary unit cannot hold a table");
      }
      cards.push(formatCard("SIMPLE", booleanValue(true)));
    } else {
      cards.push(
        formatCard("XTENSION", stringValue(unit.data?.type === "table" ? "BINTABLE" : "IMAGE")),
      );
    }

    if (unit.data?.type === "table") {
      const table = encodeTable(unit.data);
      cards.push(...table.cards);
      data = table.data;
    } else if (unit.data?.type === "image") {
      cards.push(formatCard("BITPIX", numberValue(unit.data.bitpix)));
      cards.push(formatCard("NAXIS", numberValue(unit.data.shape.length)));
      unit.data.shape.forEach((n, axis) => cards.push(formatCard(`NAXIS${axis + 1}`, numberValue(n))));
      if (index > 0) {
        cards.push(formatCard("PCOUNT", numberValue(0)), formatCard("GCOUNT", numberValue(1)));
      }
      data = encodeImage(unit.data);
    } else {
      cards.push(formatCard("BITPIX", numberValue(8)), formatCard("NAXIS", numberValue(0)));
      if (index > 0) {
        cards.push(formatCard("PCOUNT", numberValue(0)), formatCard("GCOUNT", numberValue(1)));
      }
    }

    if (index === 0) {
      cards.push(formatCard("EXTEND", booleanValue(units.length > 1)));
    } else if (unit.name) {
      cards.push(formatCard("EXTNAME", stringValue(unit.name)));
      cards.push(formatCard("EXTVER", numberValue(unit.version ?? 1)));
    }

    cards.push(...userCards(unit.header));
    parts.push(encodeHeader(cards), data);
  });

  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Encode units and write them to a file, creating parent directories
 */
export async function writeFits(filePath: string, units: UnitSpec[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, encodeFits(units));
}
