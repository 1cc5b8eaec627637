/**
 * Fallback reader for files with no recognised structure (logs, trailers).
 * The whole file is one unit whose data is its bytes.
 */

import type { ArtifactReader } from "./types.js";

export const opaqueReader: ArtifactReader = {
  kind: "opaque",
  detect: () => true,
  parse: (buffer) => [
    {
      id: "DATA",
      index: 0,
      kind: buffer.length === 0 ? "empty" : "bytes",
      header: new Map(),
      data: buffer.length === 0 ? null : { type: "array", shape: [buffer.length], values: buffer },
    },
  ],
};
