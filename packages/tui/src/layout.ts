import { type MatchList, resolveHandle } from "./match-engine";
import type { SelectionSet } from "./selection";
import { charCount, truncateToWidth, visibleWidth } from "./utils";
import type { Viewport } from "./viewport";

export interface TerminalDimensions {
	width: number;
	height: number;
}

/** Column of the position marker. */
export const POSITION_COLUMN = 0;
/** Column of the selection marker. */
export const SELECTION_COLUMN = 1;
/** First column of candidate text. */
export const TEXT_COLUMN = 2;
/** Width of the overflow marker drawn at the right edge. */
export const OVERFLOW_WIDTH = 2;

/**
 * Fixed screen geometry for a terminal size.
 * Rows 0..maxRows are list rows, counted upwards from the bottom; line
 * `height - 1` holds the pattern.
 */
export interface ScreenGeometry {
	width: number;
	height: number;
	maxRows: number;
	patternLine: number;
}

export function screenGeometry(dimensions: TerminalDimensions): ScreenGeometry {
	const width = Math.max(0, dimensions.width);
	const height = Math.max(1, dimensions.height);
	return {
		width,
		height,
		maxRows: Math.max(0, height - 2),
		patternLine: height - 1,
	};
}

/**
 * Screen line of a list row, or undefined when the row is off screen.
 */
export function rowLine(geometry: ScreenGeometry, row: number): number | undefined {
	if (row < 0 || row > geometry.maxRows) return undefined;
	return geometry.maxRows - row;
}

export interface RenderRow {
	/** Row index counted upwards from the bottom */
	row: number;
	/** Screen line (0 = top) */
	line: number;
	/** Index into the candidate list */
	handle: number;
	/** Candidate text, cut to fit when `overflow` is set */
	text: string;
	overflow: boolean;
	position: boolean;
	selected: boolean;
}

export interface RenderPlan {
	geometry: ScreenGeometry;
	rows: RenderRow[];
	pattern: string;
	/** Cursor column on the pattern line */
	cursorColumn: number;
}

/**
 * Compute the screen layout for the current state. Pure; drawing is done by
 * the Renderer.
 */
export function layout(
	candidates: readonly string[],
	matches: MatchList,
	viewport: Viewport,
	selection: SelectionSet,
	dimensions: TerminalDimensions,
	pattern: string,
): RenderPlan {
	const geometry = screenGeometry(dimensions);
	const { width, maxRows } = geometry;
	const rows: RenderRow[] = [];

	const last = Math.min(maxRows, matches.length - viewport.offset - 1);
	for (let row = 0; row <= last; row++) {
		const handle = matches[viewport.offset + row];
		const value = resolveHandle(candidates, handle);
		// Text starts at the third column
		const overflow = visibleWidth(value) > width - TEXT_COLUMN;
		rows.push({
			row,
			line: maxRows - row,
			handle,
			text: overflow ? truncateToWidth(value, width - TEXT_COLUMN - OVERFLOW_WIDTH) : value,
			overflow,
			position: row === viewport.index,
			selected: selection.has(value),
		});
	}

	return { geometry, rows, pattern, cursorColumn: charCount(pattern) };
}
