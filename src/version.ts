import { readFileSync } from "node:fs";

// src/version.ts when run from source, dist/src/version.js when built
const MANIFESTS = ["../package.json", "../../package.json"];

function readVersion(): string {
  for (const relative of MANIFESTS) {
    let manifest: unknown;
    try {
      manifest = JSON.parse(readFileSync(new URL(relative, import.meta.url), "utf-8"));
    } catch {
      continue;
    }
    if (
      typeof manifest === "object" &&
      manifest !== null &&
      "name" in manifest &&
      manifest.name === "fits-regress" &&
      "version" in manifest &&
      typeof manifest.version === "string"
    ) {
      return manifest.version;
    }
  }
  return "0.0.0";
}

export const VERSION: string = readVersion();
