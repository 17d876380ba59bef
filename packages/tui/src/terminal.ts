import * as fs from "node:fs";
import { logger } from "@fuzzpick/utils";
import { describeError, IoError, TerminalError } from "./errors";

/**
 * Terminal driver used by the picker.
 *
 * Drawing commands are queued in order and only reach the terminal on
 * `flush()`, so one event produces one write.
 */
export interface Terminal {
	// Terminal dimensions in cells
	get columns(): number;
	get rows(): number;

	// Raw input mode (no line buffering, no echo)
	enableRawMode(): void;
	disableRawMode(): void;

	// Queued commands
	enterAlternateScreen(): void;
	leaveAlternateScreen(): void;
	setLineWrap(enabled: boolean): void;
	moveTo(column: number, row: number): void; // 0-based
	clearScreen(): void;
	write(data: string): void;

	// Send everything queued so far
	flush(): Promise<void>;
}

export const ENTER_ALTERNATE_SCREEN = "\x1b[?1049h";
export const LEAVE_ALTERNATE_SCREEN = "\x1b[?1049l";
export const DISABLE_LINE_WRAP = "\x1b[?7l";
export const ENABLE_LINE_WRAP = "\x1b[?7h";
export const CLEAR_SCREEN = "\x1b[2J";
export const SHOW_CURSOR = "\x1b[?25h";

/** CUP: move the cursor to a 0-based (column, row). */
export function cursorTo(column: number, row: number): string {
	return `\x1b[${row + 1};${column + 1}H`;
}

/**
 * Terminal that keeps an ordered queue of ANSI commands.
 * Subclasses decide where flushed output goes and how raw mode is toggled.
 */
export abstract class BufferedTerminal implements Terminal {
	#pending: string[] = [];

	abstract get columns(): number;
	abstract get rows(): number;
	abstract enableRawMode(): void;
	abstract disableRawMode(): void;

	/** Deliver a chunk of output. Rejections are reported as {@link IoError}. */
	protected abstract output(data: string): Promise<void>;

	/** Commands queued since the last flush. */
	get pending(): string {
		return this.#pending.join("");
	}

	enterAlternateScreen(): void {
		this.#pending.push(ENTER_ALTERNATE_SCREEN);
	}

	leaveAlternateScreen(): void {
		this.#pending.push(LEAVE_ALTERNATE_SCREEN);
	}

	setLineWrap(enabled: boolean): void {
		this.#pending.push(enabled ? ENABLE_LINE_WRAP : DISABLE_LINE_WRAP);
	}

	moveTo(column: number, row: number): void {
		this.#pending.push(cursorTo(Math.max(0, column), Math.max(0, row)));
	}

	clearScreen(): void {
		this.#pending.push(CLEAR_SCREEN);
	}

	write(data: string): void {
		if (data) this.#pending.push(data);
	}

	async flush(): Promise<void> {
		if (this.#pending.length === 0) return;
		const data = this.#pending.join("");
		this.#pending = [];
		try {
			await this.output(data);
		} catch (err) {
			if (err instanceof IoError) throw err;
			throw new IoError(`terminal write failed: ${describeError(err)}`, { bytes: data.length }, { cause: err });
		}
	}
}

// Track active terminal for emergency cleanup on crash
let activeTerminal: ProcessTerminal | null = null;

/**
 * Emergency terminal restore - call this from signal/crash handlers.
 * Leaves the alternate screen, re-enables line wrap and restores the input mode
 * of whichever terminal is currently in raw mode.
 */
export function emergencyTerminalRestore(): void {
	const terminal = activeTerminal;
	if (!terminal) return;
	try {
		terminal.restoreSync();
	} catch (err) {
		// Terminal may already be dead during crash cleanup
		logger.warn("emergency terminal restore failed", { error: describeError(err) });
	}
}

export interface ProcessTerminalOptions {
	/** Append every flushed chunk to this file (debugging aid). */
	writeLogPath?: string;
}

/**
 * Real terminal on a TTY input/output stream pair.
 */
export class ProcessTerminal extends BufferedTerminal {
	#wasRaw = false;
	#rawEnabled = false;
	#writeLogPath: string;

	constructor(
		private readonly input: NodeJS.ReadStream,
		private readonly out: NodeJS.WriteStream,
		options: ProcessTerminalOptions = {},
	) {
		super();
		this.#writeLogPath = options.writeLogPath ?? "";
	}

	get columns(): number {
		return this.out.columns || 80;
	}

	get rows(): number {
		return this.out.rows || 24;
	}

	enableRawMode(): void {
		if (!this.input.isTTY || typeof this.input.setRawMode !== "function") {
			throw new TerminalError("input is not a terminal, cannot enable raw mode");
		}
		this.#wasRaw = this.input.isRaw;
		try {
			this.input.setRawMode(true);
		} catch (err) {
			throw new TerminalError(`failed to enable raw mode: ${describeError(err)}`, undefined, { cause: err });
		}
		this.#rawEnabled = true;
		// Register for emergency cleanup
		activeTerminal = this;
	}

	disableRawMode(): void {
		if (activeTerminal === this) {
			activeTerminal = null;
		}
		if (!this.#rawEnabled) return;
		this.#rawEnabled = false;
		try {
			this.input.setRawMode(this.#wasRaw);
		} catch (err) {
			throw new TerminalError(`failed to restore input mode: ${describeError(err)}`, undefined, { cause: err });
		}
	}

	/**
	 * Synchronous best-effort restore for crash handlers, bypassing the queue.
	 */
	restoreSync(): void {
		this.out.write(LEAVE_ALTERNATE_SCREEN + ENABLE_LINE_WRAP + SHOW_CURSOR);
		this.disableRawMode();
	}

	protected output(data: string): Promise<void> {
		this.#appendWriteLog(data);
		return new Promise<void>((resolve, reject) => {
			try {
				this.out.write(data, err => {
					if (err) reject(err);
					else resolve();
				});
			} catch (err) {
				reject(err);
			}
		});
	}

	#appendWriteLog(data: string): void {
		if (!this.#writeLogPath) return;
		try {
			fs.appendFileSync(this.#writeLogPath, data, { encoding: "utf8" });
		} catch (err) {
			logger.warn("terminal write log disabled", { path: this.#writeLogPath, error: describeError(err) });
			this.#writeLogPath = "";
		}
	}
}
