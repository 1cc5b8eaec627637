/**
 * tslog loggers for the harness.
 *
 * Library entry points take a logger through their options or the run
 * context and fall back to a hidden one, so nothing prints unless a caller
 * (normally the CLI) asks for it.
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Ordered as tslog numbers its levels */
export const LOG_LEVELS: readonly LogLevel[] = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export interface LoggerConfig {
  name: string;
  level: LogLevel;
  /** Styled single-line output; plain JSON objects otherwise */
  pretty: boolean;
  /** Also append every record as a JSON line to this file */
  logFile?: string;
}

const ROOT_NAME = "regress";

export function minLevelOf(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const { name = ROOT_NAME, level = "info", pretty = true, logFile } = config;

  const logger = new Logger<ILogObj>({
    name,
    type: pretty ? "pretty" : "json",
    minLevel: minLevelOf(level),
    prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    prettyLogTimeZone: "local",
  });

  if (logFile !== undefined) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    logger.attachTransport((record) => {
      fs.appendFileSync(logFile, `${JSON.stringify(record)}\n`);
    });
  }

  return logger;
}

/** Sub-logger for one stage of a run, e.g. "dispatch" */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

export function createSilentLogger(): Logger<ILogObj> {
  return new Logger<ILogObj>({ name: ROOT_NAME, type: "hidden" });
}

/**
 * Run `fn`, logging how long it took at debug level, or the failure at error level
 */
export async function logTiming<T>(
  logger: Logger<ILogObj>,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  const elapsed = (): string => `${Math.round(performance.now() - start)} ms`;
  try {
    const result = await fn();
    logger.debug(`${operation} took ${elapsed()}`);
    return result;
  } catch (error) {
    logger.error(`${operation} failed after ${elapsed()}`, error);
    throw error;
  }
}
