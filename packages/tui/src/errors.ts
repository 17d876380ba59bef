/**
 * Error types surfaced by the picker.
 *
 * Both kinds end the session: the picker restores the terminal (best effort)
 * and rethrows to the caller of `select`.
 */

export type PickerErrorKind = "io" | "terminal";

/**
 * Base error for picker failures.
 */
export abstract class PickerError extends Error {
	abstract readonly kind: PickerErrorKind;

	constructor(
		message: string,
		readonly context?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Writing to, flushing or reading from the terminal failed.
 */
export class IoError extends PickerError {
	readonly kind = "io";
}

/**
 * The terminal refused a mode change (raw input, alternate screen) or is not a TTY.
 */
export class TerminalError extends PickerError {
	readonly kind = "terminal";
}

/** Describe an unknown thrown value for error messages and log context. */
export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
