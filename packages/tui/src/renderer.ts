import {
	OVERFLOW_WIDTH,
	POSITION_COLUMN,
	type RenderPlan,
	rowLine,
	type ScreenGeometry,
	SELECTION_COLUMN,
	TEXT_COLUMN,
} from "./layout";
import type { Terminal } from "./terminal";
import type { PickerTheme } from "./theme";

/**
 * Turns layouts into terminal commands. Nothing is sent until the terminal
 * is flushed.
 */
export class Renderer {
	constructor(
		private readonly terminal: Terminal,
		private readonly theme: PickerTheme,
	) {}

	/** Clear the screen and draw every row, marker and the pattern line. */
	draw(plan: RenderPlan): void {
		const { terminal, theme } = this;
		const { geometry } = plan;
		terminal.clearScreen();

		for (const row of plan.rows) {
			terminal.moveTo(TEXT_COLUMN, row.line);
			terminal.write(theme.text(row.text));
			if (row.selected) {
				terminal.moveTo(SELECTION_COLUMN, row.line);
				terminal.write(theme.selected(theme.symbols.selected));
			}
			if (row.overflow) {
				terminal.moveTo(geometry.width - OVERFLOW_WIDTH, row.line);
				terminal.write(theme.overflow(theme.symbols.overflow));
			}
			if (row.position) {
				terminal.moveTo(POSITION_COLUMN, row.line);
				terminal.write(theme.position(theme.symbols.position));
			}
		}

		terminal.moveTo(0, geometry.patternLine);
		terminal.write(theme.pattern(plan.pattern));
	}

	/** Show or hide the position marker on one row. */
	setPosition(geometry: ScreenGeometry, row: number, show: boolean): void {
		const line = rowLine(geometry, row);
		if (line === undefined) return;
		this.terminal.moveTo(POSITION_COLUMN, line);
		this.terminal.write(show ? this.theme.position(this.theme.symbols.position) : " ");
	}

	/** Show or hide the selection marker on one row. */
	setSelected(geometry: ScreenGeometry, row: number, show: boolean): void {
		const line = rowLine(geometry, row);
		if (line === undefined) return;
		this.terminal.moveTo(SELECTION_COLUMN, line);
		this.terminal.write(show ? this.theme.selected(this.theme.symbols.selected) : " ");
	}

	/** Park the cursor after the pattern text. */
	placeCursor(geometry: ScreenGeometry, cursorColumn: number): void {
		this.terminal.moveTo(cursorColumn, geometry.patternLine);
	}
}
