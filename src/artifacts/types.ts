/**
 * Artifact access model
 *
 * An artifact is a file made of named structural units. Each unit carries
 * header metadata and optionally array or table data.
 */

/**
 * Header value, tagged by its type
 */
export type MetadataValue =
  | { type: "string"; value: string }
  | { type: "number"; value: number }
  /** Integer outside the range a double holds exactly */
  | { type: "bigint"; value: bigint }
  | { type: "boolean"; value: boolean };

export type Header = Map<string, MetadataValue>;

/** Exact 64-bit integers, signed or unsigned */
export type IntegerArray = BigInt64Array | BigUint64Array;

export type NumericValues = ArrayLike<number> | IntegerArray;

export function isIntegerArray(values: NumericValues): values is IntegerArray {
  return values instanceof BigInt64Array || values instanceof BigUint64Array;
}

/**
 * N-dimensional numeric array; shape is fastest-varying axis first
 */
export interface ArrayData {
  type: "array";
  shape: number[];
  values: NumericValues;
}

export type ColumnValues =
  | { type: "numeric"; values: NumericValues }
  | { type: "string"; values: string[] };

export interface TableColumn {
  name: string;
  /** Format code as declared by the file (e.g. "1E", "20A") */
  format: string;
  /** Elements per row */
  repeat: number;
  data: ColumnValues;
}

export interface TableData {
  type: "table";
  rows: number;
  columns: TableColumn[];
}

export type UnitData = ArrayData | TableData;

export type UnitKind = "image" | "table" | "bytes" | "empty";

export interface ArtifactUnit {
  /** Identifier used to pair units across files */
  id: string;
  /** Position in the file */
  index: number;
  kind: UnitKind;
  header: Header;
  data: UnitData | null;
}

export interface ArtifactHandle {
  path: string;
  /** Reader that recognised the file, e.g. "fits" */
  kind: string;
  units: ArtifactUnit[];
}

/**
 * Parser for one artifact format
 */
export interface ArtifactReader {
  kind: string;
  /** Whether the leading bytes belong to this format */
  detect(head: Uint8Array): boolean;
  /** Parse a whole file; throws on malformed content */
  parse(buffer: Uint8Array): ArtifactUnit[];
}

export function stringValue(value: string): MetadataValue {
  return { type: "string", value };
}

export function numberValue(value: number): MetadataValue {
  return { type: "number", value };
}

export function bigintValue(value: bigint): MetadataValue {
  return { type: "bigint", value };
}

export function booleanValue(value: boolean): MetadataValue {
  return { type: "boolean", value };
}

/**
 * Render a header value the way a user would type it
 */
export function formatMetadataValue(value: MetadataValue | undefined): string {
  if (!value) return "undefined";
  switch (value.type) {
    case "string":
      return `"${value.value}"`;
    case "boolean":
      return value.value ? "T" : "F";
    case "number":
    case "bigint":
      return String(value.value);
  }
}
