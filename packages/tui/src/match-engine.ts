import { logger } from "@fuzzpick/utils";
import { compareCandidates, createFzfScorer, type Scorer } from "./fuzzy";

/**
 * Ranked view of the candidates for one pattern: indices into the candidate
 * list, best match first.
 */
export type MatchList = readonly number[];

/**
 * Look up the candidate a match list handle points at.
 * @throws RangeError when the handle is outside the candidate list
 */
export function resolveHandle(candidates: readonly string[], handle: number): string {
	const value = candidates[handle];
	if (value === undefined) {
		throw new RangeError(`candidate handle ${handle} out of range (0..${candidates.length - 1})`);
	}
	return value;
}

/**
 * Ranks a fixed candidate list against patterns.
 *
 * An empty pattern lists every candidate in lexicographic order. Otherwise only
 * scored candidates are kept, best score first, equal scores lexicographic.
 */
export class MatchEngine {
	readonly #scorer: Scorer;

	constructor(
		readonly candidates: readonly string[],
		scorer?: Scorer,
	) {
		this.#scorer = scorer ?? createFzfScorer(candidates);
	}

	rank(pattern: string): MatchList {
		return logger.time("rank", () => this.#rank(pattern));
	}

	/** Materialize a handle from a match list. */
	candidate(handle: number): string {
		return resolveHandle(this.candidates, handle);
	}

	#rank(pattern: string): MatchList {
		const { candidates } = this;
		if (!pattern) {
			const all = candidates.map((_c, i) => i);
			all.sort((a, b) => compareCandidates(candidates[a] ?? "", candidates[b] ?? ""));
			return all;
		}

		const scored: Array<{ handle: number; value: string; score: number }> = [];
		for (let handle = 0; handle < candidates.length; handle++) {
			const value = candidates[handle] ?? "";
			const score = this.#scorer(value, pattern);
			if (score !== undefined && !Number.isNaN(score)) {
				scored.push({ handle, value, score });
			}
		}
		scored.sort((a, b) => b.score - a.score || compareCandidates(a.value, b.value));
		return scored.map(entry => entry.handle);
	}
}
