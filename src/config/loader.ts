/**
 * Configuration loader for fits-regress
 *
 * Priority (highest first):
 * 1. Environment variables (REGRESS_LOG_LEVEL, REGRESS_MAX_THREADS, REGRESS_TIMEOUT_MS)
 * 2. Config file (explicit path, or <cwd>/.regress/config.json)
 * 3. Built-in defaults
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import { HarnessConfigSchema, type HarnessConfig } from "./schema.js";
import { ConfigError, errnoCode } from "../utils/errors.js";
import { CONFIG_DIR, CONFIG_FILE } from "./paths.js";

/**
 * Get the project config path (in current directory)
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load configuration, falling back to defaults when no file exists
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<HarnessConfig> {
  const resolvedPath = configPath ?? getProjectConfigPath();
  const fileConfig = await loadConfigFile(resolvedPath, { required: configPath !== undefined });
  return parseConfig(applyEnvOverrides(fileConfig ?? {}, env), resolvedPath);
}

/**
 * Read a config file; a missing optional file yields null
 */
async function loadConfigFile(
  configPath: string,
  options: { required: boolean },
): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT" && !options.required) {
      return null;
    }
    throw new ConfigError("Failed to read configuration", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

/**
 * Overlay environment variables on a raw (unvalidated) config object
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  if (env.REGRESS_LOG_LEVEL) {
    result.logging = { ...section(raw, "logging"), level: env.REGRESS_LOG_LEVEL };
  }

  const execution = { ...section(raw, "execution") };
  if (env.REGRESS_MAX_THREADS) {
    execution.concurrency = Number(env.REGRESS_MAX_THREADS);
  }
  if (env.REGRESS_TIMEOUT_MS) {
    execution.timeoutMs = Number(env.REGRESS_TIMEOUT_MS);
  }
  if (env.REGRESS_MAX_THREADS || env.REGRESS_TIMEOUT_MS) {
    result.execution = execution;
  }

  return result;
}

/**
 * Validate a raw config object and apply defaults
 */
export function parseConfig(raw: unknown, configPath?: string): HarnessConfig {
  const result = HarnessConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new ConfigError("Invalid configuration", { issues, configPath });
  }
  return result.data;
}

/**
 * Check if a project config file exists
 */
export async function configExists(cwd?: string): Promise<boolean> {
  try {
    await fs.access(getProjectConfigPath(cwd));
    return true;
  } catch {
    return false;
  }
}
