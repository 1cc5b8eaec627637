/**
 * FITS reader
 *
 * Splits a file into header/data units (HDUs) and decodes image arrays and
 * tables into the artifact model.
 */

import type { ArrayData, ArtifactReader, ArtifactUnit, Header, UnitData, UnitKind } from "../types.js";
import {
  BLOCK_SIZE,
  numberKeyword,
  padToBlock,
  parseHeader,
  scalingKeyword,
  stringKeyword,
} from "./header.js";
import { exactIntegerKind, readIntegers, toIntegerArray } from "./integers.js";
import { decodeAsciiTable, decodeBinaryTable } from "./table.js";

const SIMPLE = "SIMPLE  =";
const XTENSION = "XTENSION=";

function startsWith(buffer: Uint8Array, offset: number, text: string): boolean {
  if (offset + text.length > buffer.length) return false;
  for (let i = 0; i < text.length; i++) {
    if (buffer[offset + i] !== text.charCodeAt(i)) return false;
  }
  return true;
}

/**
 * Axis lengths NAXIS1..NAXISn
 */
export function axes(header: Header): number[] {
  const naxis = numberKeyword(header, "NAXIS");
  const shape: number[] = [];
  for (let i = 1; i <= naxis; i++) {
    shape.push(numberKeyword(header, `NAXIS${i}`));
  }
  return shape;
}

/**
 * Size in bytes of the data section described by a header (before padding)
 */
export function dataSize(header: Header): number {
  const shape = axes(header);
  if (shape.length === 0) return 0;
  const bitpix = numberKeyword(header, "BITPIX");
  const pcount = numberKeyword(header, "PCOUNT", 0);
  const gcount = numberKeyword(header, "GCOUNT", 1);
  const elements = shape.reduce((product, n) => product * n, 1);
  return (Math.abs(bitpix) / 8) * gcount * (pcount + elements);
}

/**
 * Decode a primary or IMAGE array, applying BSCALE/BZERO.
 * 64-bit integers stay exact unless the scaling would change them.
 */
export function decodeImage(header: Header, data: Uint8Array): ArrayData {
  const shape = axes(header);
  const bitpix = numberKeyword(header, "BITPIX");
  const count = shape.reduce((product, n) => product * n, 1);
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const exact = bitpix === 64 ? exactIntegerKind(header, "BSCALE", "BZERO") : null;
  if (exact !== null) {
    return { type: "array", shape, values: toIntegerArray(readIntegers(view, 0, count), exact) };
  }

  const scale = scalingKeyword(header, "BSCALE", 1);
  const zero = scalingKeyword(header, "BZERO", 0);
  const values = new Float64Array(count);

  for (let i = 0; i < count; i++) {
    let raw: number;
    switch (bitpix) {
      case 8:
        raw = view.getUint8(i);
        break;
      case 16:
        raw = view.getInt16(i * 2);
        break;
      case 32:
        raw = view.getInt32(i * 4);
        break;
      case 64:
        raw = Number(view.getBigInt64(i * 8));
        break;
      case -32:
        raw = view.getFloat32(i * 4);
        break;
      case -64:
        raw = view.getFloat64(i * 8);
        break;
      default:
        throw new Error(`Unsupported BITPIX ${bitpix}`);
    }
    values[i] = zero + scale * raw;
  }

  return { type: "array", shape, values };
}

/**
 * Identifier pairing this unit with its counterpart in another file
 */
function unitId(header: Header, index: number, taken: Set<string>): string {
  let id: string;
  const extname = stringKeyword(header, "EXTNAME")?.trim();
  if (index === 0) {
    id = "PRIMARY";
  } else if (extname) {
    const extver = numberKeyword(header, "EXTVER", 1);
    id = `${extname.toUpperCase()},${extver}`;
  } else {
    id = `HDU${index}`;
  }
  if (taken.has(id)) {
    id = `${id}#${index}`;
  }
  taken.add(id);
  return id;
}

function decodeUnit(
  header: Header,
  index: number,
  data: Uint8Array,
): { kind: UnitKind; data: UnitData | null } {
  const xtension = index === 0 ? "PRIMARY" : (stringKeyword(header, "XTENSION") ?? "").trim();

  if (data.length === 0) {
    return { kind: "empty", data: null };
  }

  switch (xtension) {
    case "PRIMARY":
    case "IMAGE":
      return { kind: "image", data: decodeImage(header, data) };
    case "BINTABLE":
      return { kind: "table", data: decodeBinaryTable(header, data) };
    case "TABLE":
      return { kind: "table", data: decodeAsciiTable(header, data) };
    default:
      // Unknown extension type: compare its raw bytes
      return {
        kind: "bytes",
        data: { type: "array", shape: [data.length], values: data },
      };
  }
}

/**
 * Parse every HDU in a FITS file
 */
export function parseFits(buffer: Uint8Array): ArtifactUnit[] {
  if (!startsWith(buffer, 0, SIMPLE)) {
    throw new Error("Not a FITS file: missing SIMPLE card");
  }

  const units: ArtifactUnit[] = [];
  const taken = new Set<string>();
  let offset = 0;

  while (offset + BLOCK_SIZE <= buffer.length) {
    const index = units.length;
    // Anything after the last extension that is not an XTENSION header is ignored
    if (index > 0 && !startsWith(buffer, offset, XTENSION)) {
      break;
    }

    const { header, dataOffset } = parseHeader(buffer, offset);
    const size = dataSize(header);
    if (dataOffset + size > buffer.length) {
      throw new Error(`HDU ${index} is truncated: expected ${size} data bytes`);
    }

    const decoded = decodeUnit(header, index, buffer.subarray(dataOffset, dataOffset + size));
    units.push({ id: unitId(header, index, taken), index, header, ...decoded });
    offset = dataOffset + padToBlock(size);
  }

  return units;
}

export const fitsReader: ArtifactReader = {
  kind: "fits",
  detect: (head) => startsWith(head, 0, SIMPLE),
  parse: parseFits,
};
