import { logger } from "@fuzzpick/utils";
import { DEFAULT_POLL_TIMEOUT_MS } from "./config";
import { describeError } from "./errors";
import type { EventSource } from "./event-source";
import type { Scorer } from "./fuzzy";
import { hasOnlyModifiers, type InputEvent, isKey, isPrintableChar, type KeyEvent, KeyModifiers } from "./keys";
import { layout, type ScreenGeometry, screenGeometry, type TerminalDimensions } from "./layout";
import { MatchEngine, type MatchList } from "./match-engine";
import { Renderer } from "./renderer";
import { SelectionSet } from "./selection";
import type { Terminal } from "./terminal";
import { plainTheme, type PickerTheme } from "./theme";
import { charCount, dropLastChar } from "./utils";
import { Viewport, type ViewportMove } from "./viewport";

export interface PickerOptions {
	/** Poll timeout of the event loop (default 2000 ms) */
	pollTimeoutMs?: number;
	theme?: PickerTheme;
	/** Scoring oracle; defaults to fzf over the candidates */
	scorer?: Scorer;
}

export type PickerState = "editing" | "terminated";

function toAsciiUpperCase(char: string): string {
	return char >= "a" && char <= "z" ? char.toUpperCase() : char;
}

/**
 * Interactive fuzzy selection over a fixed candidate list.
 *
 * Owns the pattern, match list, viewport and selection, and applies every
 * event in the order: edit pattern, rerank, reclamp viewport, redraw.
 */
export class Picker {
	readonly #engine: MatchEngine;
	readonly #renderer: Renderer;
	readonly #selection = new SelectionSet();
	readonly #viewport: Viewport;
	readonly #pollTimeoutMs: number;
	#pattern = "";
	#matches: MatchList;
	#dimensions: TerminalDimensions;
	#state: PickerState = "editing";
	#modesEntered = false;

	constructor(
		private readonly terminal: Terminal,
		private readonly events: EventSource,
		candidates: readonly string[],
		options: PickerOptions = {},
	) {
		this.#engine = new MatchEngine(candidates, options.scorer);
		this.#renderer = new Renderer(terminal, options.theme ?? plainTheme);
		this.#pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
		this.#dimensions = { width: terminal.columns, height: terminal.rows };
		this.#viewport = new Viewport(screenGeometry(this.#dimensions).maxRows);
		this.#matches = this.#engine.rank(this.#pattern);
	}

	get state(): PickerState {
		return this.#state;
	}

	get pattern(): string {
		return this.#pattern;
	}

	/** Current match list as candidate values, best match first. */
	get matches(): string[] {
		return this.#matches.map(handle => this.#engine.candidate(handle));
	}

	get viewport(): Viewport {
		return this.#viewport;
	}

	get dimensions(): TerminalDimensions {
		return { ...this.#dimensions };
	}

	get selected(): string[] {
		return this.#selection.values();
	}

	/**
	 * Run the session until the user confirms. Terminal modes are restored on
	 * every exit path.
	 */
	async run(): Promise<string[]> {
		logger.debug("picker session started", {
			candidates: this.#engine.candidates.length,
			width: this.#dimensions.width,
			height: this.#dimensions.height,
		});
		try {
			await this.#loop();
		} catch (err) {
			logger.error("picker session failed", { error: describeError(err) });
			await this.#restoreQuietly();
			throw err;
		}
		await this.#restore();

		const result = this.result();
		logger.debug("picker session finished", { selected: result.length, pattern: this.#pattern });
		return result;
	}

	/**
	 * The toggled candidates, or else the candidate under the cursor, or else
	 * nothing.
	 */
	result(): string[] {
		if (this.#selection.size > 0) return this.#selection.values();
		const handle = this.#matches[this.#viewport.position];
		return handle === undefined ? [] : [this.#engine.candidate(handle)];
	}

	/** Apply one input event. Ignored once terminated. */
	dispatch(event: InputEvent): void {
		if (this.#state === "terminated") return;
		if (event.type === "resize") {
			this.#resize(event.width, event.height);
			return;
		}
		this.#handleKey(event);
	}

	async #loop(): Promise<void> {
		const { terminal, events } = this;
		terminal.enableRawMode();
		this.#modesEntered = true;
		terminal.enterAlternateScreen();
		terminal.setLineWrap(false);

		this.#redraw();
		this.#placeCursor();
		await terminal.flush();

		while (this.#state === "editing") {
			if (await events.poll(this.#pollTimeoutMs)) {
				this.dispatch(events.read());
			}
			this.#placeCursor();
			await terminal.flush();
		}
	}

	#handleKey(event: KeyEvent): void {
		const ctrlChord = (char: string) => event.modifiers === KeyModifiers.Ctrl && isKey(event, { char });

		if (isKey(event, "enter") || ctrlChord("m")) {
			this.#state = "terminated";
		} else if (isKey(event, "up") || ctrlChord("p")) {
			this.#move(this.#viewport.index, this.#viewport.moveUp(this.#matches.length));
		} else if (isKey(event, "down") || ctrlChord("n")) {
			this.#move(this.#viewport.index, this.#viewport.moveDown(this.#matches.length));
		} else if (isKey(event, "tab")) {
			this.#toggle();
		} else if (isKey(event, "backspace")) {
			if (this.#pattern) this.#setPattern(dropLastChar(this.#pattern));
		} else if (typeof event.code !== "string") {
			const { char } = event.code;
			if (!isPrintableChar(char) || !hasOnlyModifiers(event.modifiers, KeyModifiers.Shift)) return;
			const shifted = (event.modifiers & KeyModifiers.Shift) !== 0;
			this.#setPattern(this.#pattern + (shifted ? toAsciiUpperCase(char) : char));
		}
	}

	#move(previousIndex: number, move: ViewportMove): void {
		if (move === "none") return;
		const geometry = this.#geometry();
		if (move === "scroll") {
			this.#redraw();
			return;
		}
		this.#renderer.setPosition(geometry, previousIndex, false);
		this.#renderer.setPosition(geometry, this.#viewport.index, true);
	}

	#toggle(): void {
		const handle = this.#matches[this.#viewport.position];
		if (handle === undefined) return;
		const selected = this.#selection.toggle(this.#engine.candidate(handle));
		this.#renderer.setSelected(this.#geometry(), this.#viewport.index, selected);
	}

	#setPattern(pattern: string): void {
		this.#pattern = pattern;
		this.#matches = this.#engine.rank(pattern);
		this.#viewport.resetForNewMatches(this.#matches.length);
		this.#redraw();
	}

	#resize(width: number, height: number): void {
		this.#dimensions = { width, height };
		this.#viewport.resize(this.#geometry().maxRows);
		this.#redraw();
	}

	#geometry(): ScreenGeometry {
		return screenGeometry(this.#dimensions);
	}

	#redraw(): void {
		this.#renderer.draw(
			layout(this.#engine.candidates, this.#matches, this.#viewport, this.#selection, this.#dimensions, this.#pattern),
		);
	}

	#placeCursor(): void {
		this.#renderer.placeCursor(this.#geometry(), charCount(this.#pattern));
	}

	async #restore(): Promise<void> {
		if (!this.#modesEntered) return;
		this.#modesEntered = false;
		this.terminal.leaveAlternateScreen();
		this.terminal.setLineWrap(true);
		try {
			await this.terminal.flush();
		} finally {
			this.terminal.disableRawMode();
		}
	}

	/** Best-effort restore on the failure path; failures are logged, not thrown. */
	async #restoreQuietly(): Promise<void> {
		if (!this.#modesEntered) return;
		this.#modesEntered = false;
		this.terminal.leaveAlternateScreen();
		this.terminal.setLineWrap(true);
		try {
			await this.terminal.flush();
		} catch (err) {
			logger.warn("failed to restore screen after error", { error: describeError(err) });
		}
		try {
			this.terminal.disableRawMode();
		} catch (err) {
			logger.warn("failed to restore input mode after error", { error: describeError(err) });
		}
	}
}
