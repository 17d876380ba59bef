import { logger } from "@fuzzpick/utils";
import { resolvePickerConfig } from "./config";
import { ProcessEventSource } from "./event-source";
import { Picker, type PickerOptions } from "./picker";
import { ProcessTerminal } from "./terminal";
import { createDefaultTheme } from "./theme";

export interface SelectOptions extends PickerOptions {
	/** Key input stream (default process.stdin) */
	input?: NodeJS.ReadStream;
	/** Mirror terminal output to this file */
	writeLogPath?: string;
}

/**
 * Let the user pick from `candidates` on the terminal behind `output`.
 *
 * Resolves to the toggled candidates, or the single candidate under the cursor
 * when nothing was toggled, or an empty list when nothing matched. Rejects with
 * an IoError or TerminalError after the terminal has been restored.
 */
export async function select(
	output: NodeJS.WriteStream,
	candidates: readonly string[],
	options: SelectOptions = {},
): Promise<string[]> {
	const config = resolvePickerConfig();
	const input = options.input ?? process.stdin;
	const terminal = new ProcessTerminal(input, output, { writeLogPath: options.writeLogPath ?? config.writeLogPath });
	const events = new ProcessEventSource(input, output);
	const picker = new Picker(terminal, events, candidates, {
		pollTimeoutMs: options.pollTimeoutMs ?? config.pollTimeoutMs,
		theme: options.theme ?? createDefaultTheme(config.color),
		scorer: options.scorer,
	});

	try {
		return await logger.timeAsync("select", () => picker.run());
	} finally {
		events.close();
	}
}
