/**
 * How a navigation step changed the viewport.
 * - "none": nothing moved
 * - "cursor": only `index` changed, the visible rows are the same
 * - "scroll": `offset` changed, every row shows a different match
 */
export type ViewportMove = "none" | "cursor" | "scroll";

/**
 * Scroll window over the match list.
 *
 * Row 0 is the bottom row and shows the best match; "up" moves toward
 * worse-ranked matches. `offset + index` is the current match position.
 */
export class Viewport {
	#offset = 0;
	#index = 0;
	#visibleRows: number;

	constructor(visibleRows: number) {
		this.#visibleRows = Math.max(0, visibleRows);
	}

	get offset(): number {
		return this.#offset;
	}

	/** Visible row of the cursor, counted upwards from the bottom. */
	get index(): number {
		return this.#index;
	}

	/** Highest row index that fits on screen (terminal height - 2). */
	get visibleRows(): number {
		return this.#visibleRows;
	}

	/** Position of the cursor in the match list. */
	get position(): number {
		return this.#offset + this.#index;
	}

	/**
	 * The match list was recomputed: show the best matches again and keep the
	 * cursor row unless the new list is shorter than that, or the screen has
	 * shrunk below it.
	 */
	resetForNewMatches(matchCount: number): void {
		this.#offset = 0;
		this.#index = matchCount === 0 ? 0 : Math.min(this.#index, matchCount - 1, this.#visibleRows);
	}

	/** Offset and index are kept; the next move re-validates them. */
	resize(visibleRows: number): void {
		this.#visibleRows = Math.max(0, visibleRows);
	}

	moveUp(matchCount: number): ViewportMove {
		const shifted = this.#revalidate();
		if (matchCount === 0 || this.position >= matchCount - 1) return shifted ? "scroll" : "none";
		if (this.#index < this.#visibleRows) {
			this.#index++;
			return shifted ? "scroll" : "cursor";
		}
		this.#offset++;
		return "scroll";
	}

	moveDown(matchCount: number): ViewportMove {
		const shifted = this.#revalidate();
		if (matchCount === 0 || this.position === 0) return shifted ? "scroll" : "none";
		if (this.#index > 0) {
			this.#index--;
			return shifted ? "scroll" : "cursor";
		}
		this.#offset--;
		return "scroll";
	}

	/**
	 * Pull a cursor row left above the top of a shrunken screen back onto it,
	 * keeping the position. Returns true when the window moved.
	 */
	#revalidate(): boolean {
		if (this.#index <= this.#visibleRows) return false;
		this.#offset += this.#index - this.#visibleRows;
		this.#index = this.#visibleRows;
		return true;
	}
}
