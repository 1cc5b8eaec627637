/**
 * FITS table extensions: BINTABLE and ASCII TABLE
 */

import {
  isIntegerArray,
  type ColumnValues,
  type Header,
  type TableColumn,
  type TableData,
} from "../types.js";
import { numberKeyword, scalingKeyword, stringKeyword } from "./header.js";
import { exactIntegerKind, readIntegers, toIntegerArray, type IntegerKind } from "./integers.js";

/** Bytes per element for each binary table type code */
const BINARY_WIDTHS: Record<string, number> = {
  L: 1,
  X: 1,
  B: 1,
  I: 2,
  J: 4,
  K: 8,
  A: 1,
  E: 4,
  D: 8,
  C: 8,
  M: 16,
  P: 8,
  Q: 16,
};

const BINARY_FORM = /^(\d*)([LXBIJKAEDCMPQ])([LXBIJKAEDCM]?)(\(\d+\))?\s*$/;
const ASCII_FORM = /^([AIFED])(\d+)(\.\d+)?\s*$/;

export interface BinaryForm {
  repeat: number;
  code: string;
  /** Element type of a variable-length array column (P or Q) */
  heapCode?: string;
}

/**
 * Parse a TFORMn value of a binary table
 */
export function parseBinaryForm(form: string): BinaryForm {
  const match = BINARY_FORM.exec(form.trim());
  if (!match?.[2]) {
    throw new Error(`Unsupported binary table format: ${form}`);
  }
  const repeat = match[1] ? Number.parseInt(match[1], 10) : 1;
  const heapCode = match[3] || undefined;
  return { repeat, code: match[2], heapCode };
}

/**
 * Bytes a column of this form occupies in one row
 */
export function binaryFieldWidth(form: BinaryForm): number {
  const width = BINARY_WIDTHS[form.code] ?? 0;
  if (form.code === "X") return Math.ceil(form.repeat / 8);
  if (form.code === "P" || form.code === "Q") return form.repeat > 0 ? width : 0;
  return width * form.repeat;
}

/**
 * Read `count` elements of a numeric type code starting at `offset`
 */
function readElements(view: DataView, offset: number, code: string, count: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    switch (code) {
      case "L": {
        const byte = view.getUint8(offset + i);
        out.push(byte === 0x54 ? 1 : byte === 0x46 ? 0 : Number.NaN);
        break;
      }
      case "X":
      case "B":
        out.push(view.getUint8(offset + i));
        break;
      case "I":
        out.push(view.getInt16(offset + i * 2));
        break;
      case "J":
        out.push(view.getInt32(offset + i * 4));
        break;
      case "K":
        out.push(Number(view.getBigInt64(offset + i * 8)));
        break;
      case "E":
        out.push(view.getFloat32(offset + i * 4));
        break;
      case "D":
        out.push(view.getFloat64(offset + i * 8));
        break;
      case "C":
        out.push(view.getFloat32(offset + i * 8), view.getFloat32(offset + i * 8 + 4));
        break;
      case "M":
        out.push(view.getFloat64(offset + i * 16), view.getFloat64(offset + i * 16 + 8));
        break;
      default:
        throw new Error(`Cannot read elements of type ${code}`);
    }
  }
  return out;
}

function readText(bytes: Uint8Array, offset: number, length: number): string {
  const slice = bytes.subarray(offset, offset + length);
  let text = "";
  for (const byte of slice) {
    if (byte === 0) break;
    text += String.fromCharCode(byte);
  }
  return text.trimEnd();
}

function applyScaling(values: number[], header: Header, column: number, code: string): number[] {
  if (code === "L" || code === "X") return values;
  const scale = scalingKeyword(header, `TSCAL${column}`, 1);
  const zero = scalingKeyword(header, `TZERO${column}`, 0);
  if (scale === 1 && zero === 0) return values;
  return values.map((v) => zero + scale * v);
}

function columnName(header: Header, column: number): string {
  return stringKeyword(header, `TTYPE${column}`)?.trim() || `col${column}`;
}

/**
 * Decode a BINTABLE data section
 */
export function decodeBinaryTable(header: Header, data: Uint8Array): TableData {
  const rowBytes = numberKeyword(header, "NAXIS1");
  const rows = numberKeyword(header, "NAXIS2");
  const fields = numberKeyword(header, "TFIELDS");
  const heapOffset = numberKeyword(header, "THEAP", rowBytes * rows);
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const columns: TableColumn[] = [];
  let fieldOffset = 0;

  for (let c = 1; c <= fields; c++) {
    const format = stringKeyword(header, `TFORM${c}`);
    if (format === undefined) {
      throw new Error(`Missing TFORM${c}`);
    }
    const form = parseBinaryForm(format);
    const width = binaryFieldWidth(form);
    const exact = exactIntegerKind(header, `TSCAL${c}`, `TZERO${c}`);
    let columnData: ColumnValues;

    if (form.code === "A") {
      const values: string[] = [];
      for (let r = 0; r < rows; r++) {
        values.push(readText(data, r * rowBytes + fieldOffset, form.repeat));
      }
      columnData = { type: "string", values };
    } else if (form.code === "P" || form.code === "Q") {
      columnData = decodeVariableLength(view, data, form, exact, {
        rows,
        rowBytes,
        fieldOffset,
        heapOffset,
      });
      if (columnData.type === "numeric" && !isIntegerArray(columnData.values)) {
        columnData = {
          type: "numeric",
          values: applyScaling(Array.from(columnData.values), header, c, form.heapCode ?? "B"),
        };
      }
    } else if (form.code === "K" && exact !== null) {
      const raw: bigint[] = [];
      for (let r = 0; r < rows; r++) {
        raw.push(...readIntegers(view, r * rowBytes + fieldOffset, form.repeat));
      }
      columnData = { type: "numeric", values: toIntegerArray(raw, exact) };
    } else {
      const perRow = form.code === "X" ? width : form.repeat;
      const values: number[] = [];
      for (let r = 0; r < rows; r++) {
        values.push(...readElements(view, r * rowBytes + fieldOffset, form.code, perRow));
      }
      columnData = { type: "numeric", values: applyScaling(values, header, c, form.code) };
    }

    columns.push({ name: columnName(header, c), format: format.trim(), repeat: form.repeat, data: columnData });
    fieldOffset += width;
  }

  return { type: "table", rows, columns };
}

/**
 * Variable-length array column: row cells are descriptors into the heap.
 * Numeric cells are flattened in row order; character cells give one string per row.
 */
function decodeVariableLength(
  view: DataView,
  data: Uint8Array,
  form: BinaryForm,
  exact: IntegerKind | null,
  layout: { rows: number; rowBytes: number; fieldOffset: number; heapOffset: number },
): ColumnValues {
  const elementCode = form.heapCode ?? "B";
  const elementWidth = BINARY_WIDTHS[elementCode] ?? 1;
  const strings: string[] = [];
  const numbers: number[] = [];
  const integers: bigint[] = [];
  const integerKind = elementCode === "K" ? exact : null;

  for (let r = 0; r < layout.rows; r++) {
    const cell = r * layout.rowBytes + layout.fieldOffset;
    const count =
      form.code === "P" ? view.getInt32(cell) : Number(view.getBigInt64(cell));
    const offset =
      form.code === "P" ? view.getInt32(cell + 4) : Number(view.getBigInt64(cell + 8));
    const start = layout.heapOffset + offset;

    if (elementCode === "A") {
      strings.push(readText(data, start, count));
    } else if (elementCode === "X") {
      numbers.push(...readElements(view, start, "X", Math.ceil(count / 8)));
    } else {
      if (start + count * elementWidth > data.length) {
        throw new Error("Variable-length array descriptor points past the heap");
      }
      if (integerKind !== null) {
        integers.push(...readIntegers(view, start, count));
      } else {
        numbers.push(...readElements(view, start, elementCode, count));
      }
    }
  }

  if (elementCode === "A") return { type: "string", values: strings };
  if (integerKind !== null) {
    return { type: "numeric", values: toIntegerArray(integers, integerKind) };
  }
  return { type: "numeric", values: numbers };
}

/**
 * Decode an ASCII TABLE data section
 */
export function decodeAsciiTable(header: Header, data: Uint8Array): TableData {
  const rowBytes = numberKeyword(header, "NAXIS1");
  const rows = numberKeyword(header, "NAXIS2");
  const fields = numberKeyword(header, "TFIELDS");
  const columns: TableColumn[] = [];

  for (let c = 1; c <= fields; c++) {
    const format = stringKeyword(header, `TFORM${c}`);
    const match = format === undefined ? null : ASCII_FORM.exec(format.trim());
    if (!format || !match?.[1] || !match[2]) {
      throw new Error(`Unsupported ASCII table format in TFORM${c}: ${format ?? "missing"}`);
    }
    const start = numberKeyword(header, `TBCOL${c}`) - 1;
    const width = Number.parseInt(match[2], 10);
    const cells: string[] = [];
    for (let r = 0; r < rows; r++) {
      const offset = r * rowBytes + start;
      let cell = "";
      for (const byte of data.subarray(offset, offset + width)) {
        cell += String.fromCharCode(byte);
      }
      cells.push(cell);
    }

    let columnData: ColumnValues;
    if (match[1] === "A") {
      columnData = { type: "string", values: cells.map((cell) => cell.trimEnd()) };
    } else {
      const values = cells.map((cell) => {
        const text = cell.trim();
        return text === "" ? Number.NaN : Number(text.replace(/[Dd]/, "E"));
      });
      columnData = { type: "numeric", values: applyScaling(values, header, c, match[1]) };
    }

    columns.push({ name: columnName(header, c), format: format.trim(), repeat: 1, data: columnData });
  }

  return { type: "table", rows, columns };
}
