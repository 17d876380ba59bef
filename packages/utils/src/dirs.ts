/**
 * Centralized path helpers for fuzzpick config directories.
 *
 * Uses FUZZPICK_CONFIG_DIR (default ".fuzzpick") for the config root.
 */

import * as os from "node:os";
import * as path from "node:path";

/** App name (e.g. "fuzzpick") */
export const APP_NAME: string = "fuzzpick";

/** Config directory name (e.g. ".fuzzpick") */
export const CONFIG_DIR_NAME: string = ".fuzzpick";

/** Get the config root directory (~/.fuzzpick). */
export function getConfigRootDir(): string {
	return path.join(os.homedir(), process.env.FUZZPICK_CONFIG_DIR || CONFIG_DIR_NAME);
}

/** Get the logs directory (~/.fuzzpick/logs). */
export function getLogsDir(): string {
	return path.join(getConfigRootDir(), "logs");
}
