import { Chalk } from "chalk";

export interface PickerSymbols {
	/** Marks the cursor row; one column wide */
	position: string;
	/** Marks selected rows; one column wide */
	selected: string;
	/** Replaces the last columns of cut candidates; two columns wide */
	overflow: string;
}

export interface PickerTheme {
	symbols: PickerSymbols;
	position: (text: string) => string;
	selected: (text: string) => string;
	overflow: (text: string) => string;
	/** Candidate text */
	text: (text: string) => string;
	pattern: (text: string) => string;
}

export const DEFAULT_SYMBOLS: PickerSymbols = {
	position: ">",
	selected: "*",
	overflow: "..",
};

const identity = (text: string): string => text;

/** Theme without any styling. */
export const plainTheme: PickerTheme = {
	symbols: DEFAULT_SYMBOLS,
	position: identity,
	selected: identity,
	overflow: identity,
	text: identity,
	pattern: identity,
};

/**
 * Default chalk theme. With `color` false every style is a no-op.
 */
export function createDefaultTheme(color = true): PickerTheme {
	const chalk = color ? new Chalk() : new Chalk({ level: 0 });
	return {
		symbols: DEFAULT_SYMBOLS,
		position: text => chalk.bold.cyan(text),
		selected: text => chalk.magenta(text),
		overflow: text => chalk.dim(text),
		text: identity,
		pattern: text => chalk.bold(text),
	};
}
