import { describe, expect, it } from "vitest";
import { Viewport } from "../src/viewport";

function viewportAt(visibleRows: number, count: number, position: number): Viewport {
	const viewport = new Viewport(visibleRows);
	for (let i = 0; i < position; i++) viewport.moveUp(count);
	return viewport;
}

describe("Viewport", () => {
	it("starts at the best match", () => {
		const viewport = new Viewport(4);
		expect({ offset: viewport.offset, index: viewport.index, position: viewport.position }).toEqual({
			offset: 0,
			index: 0,
			position: 0,
		});
	});

	it("clamps negative row counts to zero", () => {
		expect(new Viewport(-3).visibleRows).toBe(0);
	});

	describe("moveUp", () => {
		it("moves the cursor until the top row, then scrolls", () => {
			const viewport = new Viewport(2);
			expect(viewport.moveUp(5)).toBe("cursor");
			expect(viewport.moveUp(5)).toBe("cursor");
			expect(viewport.moveUp(5)).toBe("scroll");
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 1, index: 2 });
		});

		it("is a no-op on the last match", () => {
			const viewport = viewportAt(2, 4, 3);
			expect(viewport.position).toBe(3);
			expect(viewport.moveUp(4)).toBe("none");
			expect(viewport.position).toBe(3);
		});

		it("is a no-op on an empty list", () => {
			const viewport = new Viewport(3);
			expect(viewport.moveUp(0)).toBe("none");
			expect(viewport.position).toBe(0);
		});

		it("scrolls on every step when only the bottom row fits", () => {
			const viewport = new Viewport(0);
			expect(viewport.moveUp(3)).toBe("scroll");
			expect(viewport.moveUp(3)).toBe("scroll");
			expect(viewport.moveUp(3)).toBe("none");
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 2, index: 0 });
		});
	});

	describe("moveDown", () => {
		it("moves the cursor to the bottom row, then scrolls", () => {
			const viewport = viewportAt(1, 5, 3);
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 2, index: 1 });
			expect(viewport.moveDown(5)).toBe("cursor");
			expect(viewport.moveDown(5)).toBe("scroll");
			expect(viewport.moveDown(5)).toBe("scroll");
			expect(viewport.moveDown(5)).toBe("none");
			expect(viewport.position).toBe(0);
		});

		it("is a no-op at position 0 for every list size", () => {
			for (const count of [0, 1, 2, 10]) {
				const viewport = new Viewport(3);
				expect(viewport.moveDown(count)).toBe("none");
				expect(viewport.position).toBe(0);
			}
		});
	});

	describe("resetForNewMatches", () => {
		it("returns to offset 0 and keeps the cursor row when it fits", () => {
			const viewport = viewportAt(2, 10, 5);
			viewport.resetForNewMatches(8);
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 0, index: 2 });
		});

		it("clamps the cursor row to a shorter list", () => {
			const viewport = viewportAt(4, 10, 3);
			viewport.resetForNewMatches(2);
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 0, index: 1 });
		});

		it("clamps the cursor row to a shrunken screen", () => {
			const viewport = viewportAt(8, 10, 6);
			viewport.resize(2);
			viewport.resetForNewMatches(10);
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 0, index: 2 });
		});

		it("zeroes everything for an empty list", () => {
			const viewport = viewportAt(4, 10, 3);
			viewport.resetForNewMatches(0);
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 0, index: 0 });
		});
	});

	describe("resize", () => {
		it("keeps offset and index", () => {
			const viewport = viewportAt(4, 10, 6);
			viewport.resize(1);
			expect({ offset: viewport.offset, index: viewport.index, visibleRows: viewport.visibleRows }).toEqual({
				offset: 2,
				index: 4,
				visibleRows: 1,
			});
		});

		it("brings the cursor back on screen on the next move up", () => {
			const viewport = viewportAt(4, 10, 6);
			viewport.resize(1);
			expect(viewport.moveUp(10)).toBe("scroll");
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 6, index: 1 });
		});

		it("brings the cursor back on screen on the next move down", () => {
			const viewport = viewportAt(4, 10, 6);
			viewport.resize(1);
			expect(viewport.moveDown(10)).toBe("scroll");
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 5, index: 0 });
		});

		it("re-validates even when the move itself is a no-op", () => {
			const viewport = viewportAt(8, 10, 6);
			viewport.resize(2);
			expect(viewport.moveUp(7)).toBe("scroll");
			expect({ offset: viewport.offset, index: viewport.index, position: viewport.position }).toEqual({
				offset: 4,
				index: 2,
				position: 6,
			});
		});

		it("leaves a cursor that still fits alone", () => {
			const viewport = viewportAt(4, 10, 2);
			viewport.resize(3);
			expect(viewport.moveUp(10)).toBe("cursor");
			expect({ offset: viewport.offset, index: viewport.index }).toEqual({ offset: 0, index: 3 });
		});
	});

	it("holds its bounds across random moves and list changes", () => {
		let seed = 42;
		const next = (n: number) => {
			seed = (seed * 48271) % 2147483647;
			return seed % n;
		};

		for (const initialRows of [0, 1, 3, 8]) {
			const viewport = new Viewport(initialRows);
			let count = next(20);
			for (let step = 0; step < 400; step++) {
				const action = next(4);
				switch (action) {
					case 0:
						viewport.moveUp(count);
						break;
					case 1:
						viewport.moveDown(count);
						break;
					case 2:
						count = next(20);
						viewport.resetForNewMatches(count);
						break;
					default:
						viewport.resize(next(10));
				}
				// A resize alone may leave the cursor above the screen until the next move
				if (action !== 3) {
					expect(viewport.index).toBeLessThanOrEqual(viewport.visibleRows);
				}
				if (count === 0) {
					expect(viewport.position).toBe(0);
				} else {
					expect(viewport.position).toBeLessThan(count);
				}
			}
		}
	});
});
