/**
 * Candidates explicitly toggled by the user, by value, in toggle order.
 * Independent of the current match list.
 */
export class SelectionSet {
	#items = new Set<string>();

	get size(): number {
		return this.#items.size;
	}

	/** Flip membership. Returns true when the candidate is now selected. */
	toggle(candidate: string): boolean {
		if (this.#items.delete(candidate)) return false;
		this.#items.add(candidate);
		return true;
	}

	has(candidate: string): boolean {
		return this.#items.has(candidate);
	}

	values(): string[] {
		return Array.from(this.#items);
	}
}
