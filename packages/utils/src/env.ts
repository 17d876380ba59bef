import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigRootDir } from "./dirs";

/**
 * Parses a .env file synchronously and extracts key-value string pairs.
 * Ignores lines that are empty or start with '#'. Trims whitespace.
 * Allows values to be quoted with single or double quotes.
 * Returns an object of key-value pairs.
 */
export function parseEnvFile(filePath: string): Record<string, string> {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch {
		// Missing or unreadable file means no overrides
		return {};
	}
	return parseEnvContent(content);
}

/**
 * Parses .env formatted text. `FZP_` keys are aliased to `FUZZPICK_`.
 */
export function parseEnvContent(content: string): Record<string, string> {
	const result: Record<string, string> = {};
	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		// Skip comments and blank lines
		if (!trimmed || trimmed.startsWith("#")) continue;

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) continue;

		const key = trimmed.slice(0, eqIndex).trim();
		let value = trimmed.slice(eqIndex + 1).trim();

		// Remove surrounding quotes (" or ')
		if (
			value.length >= 2 &&
			((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
		) {
			value = value.slice(1, -1);
		}

		result[key] = value;
	}

	// FUZZPICK_ wins over FZP_ when both are present
	for (const [k, v] of Object.entries(result)) {
		if (k.startsWith("FZP_")) {
			const full = `FUZZPICK_${k.slice(4)}`;
			if (!(full in result)) {
				result[full] = v;
			}
		}
	}

	return result;
}

// Eagerly merge ~/.fuzzpick/.env into the process environment
const configEnv = parseEnvFile(path.join(getConfigRootDir(), ".env"));
for (const [key, value] of Object.entries(configEnv)) {
	if (!process.env[key]) {
		process.env[key] = value;
	}
}

/**
 * Intentional re-export of process.env.
 *
 * Import this module (import { $env } from "@fuzzpick/utils") before reading
 * environment variables so that ~/.fuzzpick/.env has already been applied.
 */
export const $env: NodeJS.ProcessEnv = process.env;
