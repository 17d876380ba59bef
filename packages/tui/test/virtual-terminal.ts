import xtermHeadless from "@xterm/headless";
import { BufferedTerminal } from "../src/terminal";

// CommonJS package: take the class off the default export
const { Terminal: XtermTerminal } = xtermHeadless;
type XtermTerminal = InstanceType<typeof XtermTerminal>;

export interface VirtualTerminalOptions {
	/** Thrown from enableRawMode */
	rawModeError?: Error;
}

/**
 * In-process terminal for tests: flushed output is parsed by a headless xterm
 * so the screen can be inspected.
 */
export class VirtualTerminal extends BufferedTerminal {
	readonly xterm: XtermTerminal;
	rawMode = false;
	/** Every chunk delivered by flush, in order */
	readonly chunks: string[] = [];
	/** Reject every write while set */
	failWrites = false;
	#columns: number;
	#rows: number;

	constructor(
		columns: number,
		rows: number,
		private readonly options: VirtualTerminalOptions = {},
	) {
		super();
		this.#columns = columns;
		this.#rows = rows;
		this.xterm = new XtermTerminal({ cols: columns, rows, allowProposedApi: true });
	}

	get columns(): number {
		return this.#columns;
	}

	get rows(): number {
		return this.#rows;
	}

	/** Everything flushed so far. */
	get written(): string {
		return this.chunks.join("");
	}

	get isAlternateScreen(): boolean {
		return this.xterm.buffer.active.type === "alternate";
	}

	get cursor(): { x: number; y: number } {
		const buffer = this.xterm.buffer.active;
		return { x: buffer.cursorX, y: buffer.cursorY };
	}

	enableRawMode(): void {
		if (this.options.rawModeError) throw this.options.rawModeError;
		this.rawMode = true;
	}

	disableRawMode(): void {
		this.rawMode = false;
	}

	resize(columns: number, rows: number): void {
		this.#columns = columns;
		this.#rows = rows;
		this.xterm.resize(columns, rows);
	}

	/** Visible lines with trailing blanks removed. */
	getViewport(): string[] {
		const buffer = this.xterm.buffer.active;
		const lines: string[] = [];
		for (let i = 0; i < this.#rows; i++) {
			lines.push(buffer.getLine(buffer.viewportY + i)?.translateToString(true) ?? "");
		}
		return lines;
	}

	protected output(data: string): Promise<void> {
		if (this.failWrites) return Promise.reject(new Error("EPIPE: broken pipe"));
		this.chunks.push(data);
		return new Promise<void>(resolve => {
			this.xterm.write(data, () => resolve());
		});
	}
}
