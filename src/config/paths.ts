/**
 * Configuration locations
 *
 * Configuration is per project: <cwd>/.regress/config.json
 */

/** Project configuration directory */
export const CONFIG_DIR = ".regress";

/** Configuration file inside CONFIG_DIR */
export const CONFIG_FILE = "config.json";

/** Run log directory inside CONFIG_DIR, used when file logging is enabled */
export const LOG_DIR = "logs";
