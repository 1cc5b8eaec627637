/**
 * Artifact access: open a file with the first reader that recognises it
 */

import fs from "node:fs/promises";
import { UnreadableArtifactError, errorMessage } from "../utils/errors.js";
import { BLOCK_SIZE, CARD_SIZE, parseHeader } from "./fits/header.js";
import { fitsReader } from "./fits/reader.js";
import { opaqueReader } from "./opaque.js";
import type { ArtifactHandle, ArtifactReader, Header } from "./types.js";

/** Readers tried in order; the opaque reader accepts anything */
export const DEFAULT_READERS: readonly ArtifactReader[] = [fitsReader, opaqueReader];

const DETECT_BYTES = 80;

/**
 * Pick the reader for a file's leading bytes
 */
export function detectReader(
  head: Uint8Array,
  readers: readonly ArtifactReader[] = DEFAULT_READERS,
): ArtifactReader | undefined {
  return readers.find((reader) => reader.detect(head.subarray(0, DETECT_BYTES)));
}

/**
 * Open an artifact read-only and decode all of its units
 *
 * @throws UnreadableArtifactError if the file cannot be read or fails to parse
 */
export async function openArtifact(
  filePath: string,
  readers: readonly ArtifactReader[] = DEFAULT_READERS,
): Promise<ArtifactHandle> {
  let buffer: Uint8Array;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new UnreadableArtifactError(`Cannot open artifact ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const reader = detectReader(buffer, readers);
  if (!reader) {
    throw new UnreadableArtifactError(`No reader recognises ${filePath}`, { path: filePath });
  }

  try {
    return { path: filePath, kind: reader.kind, units: reader.parse(buffer) };
  } catch (error) {
    throw new UnreadableArtifactError(
      `Cannot parse ${filePath} as ${reader.kind}: ${errorMessage(error)}`,
      { path: filePath, cause: error instanceof Error ? error : undefined },
    );
  }
}

/** Headers longer than this many blocks are rejected */
const MAX_HEADER_BLOCKS = 1024;

/**
 * Read only the primary header of a FITS file, block by block
 *
 * @throws UnreadableArtifactError if the file cannot be read or is not FITS
 */
export async function readPrimaryHeader(filePath: string): Promise<Header> {
  let handle: fs.FileHandle | undefined;
  try {
    handle = await fs.open(filePath, "r");
    const blocks: Uint8Array[] = [];

    while (blocks.length < MAX_HEADER_BLOCKS) {
      const block = new Uint8Array(BLOCK_SIZE);
      const { bytesRead } = await handle.read(block, 0, BLOCK_SIZE, blocks.length * BLOCK_SIZE);
      if (bytesRead < BLOCK_SIZE) break;
      if (blocks.length === 0 && !fitsReader.detect(block)) {
        throw new Error("not a FITS file");
      }
      blocks.push(block);
      if (hasEndCard(block)) {
        const buffer = new Uint8Array(blocks.length * BLOCK_SIZE);
        blocks.forEach((b, i) => buffer.set(b, i * BLOCK_SIZE));
        return parseHeader(buffer, 0).header;
      }
    }
    throw new Error("primary header has no END card");
  } catch (error) {
    throw new UnreadableArtifactError(`Cannot read header of ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  } finally {
    await handle?.close();
  }
}

function hasEndCard(block: Uint8Array): boolean {
  for (let offset = 0; offset < BLOCK_SIZE; offset += CARD_SIZE) {
    if (
      block[offset] === 0x45 && // E
      block[offset + 1] === 0x4e && // N
      block[offset + 2] === 0x44 && // D
      block.subarray(offset + 3, offset + 8).every((byte) => byte === 0x20)
    ) {
      return true;
    }
  }
  return false;
}
