/**
 * Configuration exports
 */

export * from "./schema.js";
export { loadConfig, parseConfig, applyEnvOverrides, configExists, getProjectConfigPath } from "./loader.js";
export { CONFIG_DIR, CONFIG_FILE, LOG_DIR } from "./paths.js";
