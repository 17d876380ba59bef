import { $env, logger } from "@fuzzpick/utils";

export const DEFAULT_POLL_TIMEOUT_MS = 2000;

export interface PickerConfig {
	/** How long one poll of the event source waits before looping again */
	pollTimeoutMs: number;
	/** Mirror terminal output to this file when set */
	writeLogPath?: string;
	/** Style markers and pattern with colours */
	color: boolean;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = Number(raw.trim());
	if (!Number.isInteger(value) || value <= 0) {
		logger.warn(`invalid ${name}, using default`, { value: raw, default: fallback });
		return fallback;
	}
	return value;
}

/**
 * Read picker settings from the environment (FUZZPICK_* variables, after
 * ~/.fuzzpick/.env has been merged).
 */
export function resolvePickerConfig(env: NodeJS.ProcessEnv = $env): PickerConfig {
	const writeLogPath = env.FUZZPICK_TUI_WRITE_LOG?.trim();
	return {
		pollTimeoutMs: parsePositiveInt("FUZZPICK_POLL_TIMEOUT_MS", env.FUZZPICK_POLL_TIMEOUT_MS, DEFAULT_POLL_TIMEOUT_MS),
		writeLogPath: writeLogPath || undefined,
		color: env.FUZZPICK_COLOR?.trim() !== "0",
	};
}
