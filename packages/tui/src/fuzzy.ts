import { Fzf } from "fzf";

/**
 * Scoring oracle: a numeric score (higher is better) or undefined for no match.
 * Matching is case-sensitive; match positions are never requested.
 */
export type Scorer = (candidate: string, pattern: string) => number | undefined;

/**
 * Total order on candidates by Unicode code point (the same order as comparing
 * their UTF-8 bytes). Plain `<` compares UTF-16 code units, which sorts astral
 * characters before U+E000..U+FFFF.
 */
export function compareCandidates(a: string, b: string): number {
	if (a === b) return 0;
	const length = Math.min(a.length, b.length);
	for (let i = 0; i < length; i++) {
		const ca = a.codePointAt(i) ?? 0;
		const cb = b.codePointAt(i) ?? 0;
		if (ca !== cb) return ca < cb ? -1 : 1;
		// Skip the low surrogate of a pair
		if (ca > 0xffff) i++;
	}
	return a.length < b.length ? -1 : 1;
}

/**
 * Scorer backed by the fzf algorithm over a fixed candidate list.
 *
 * fzf works on whole lists, so each distinct pattern runs one query and the
 * per-candidate answers come from that result.
 */
export function createFzfScorer(candidates: readonly string[]): Scorer {
	const fzf = new Fzf(Array.from(new Set(candidates)), {
		casing: "case-sensitive",
		normalize: false,
	});
	let cachedPattern: string | undefined;
	let scores = new Map<string, number>();

	return (candidate, pattern) => {
		if (pattern !== cachedPattern) {
			scores = new Map();
			for (const entry of fzf.find(pattern)) {
				scores.set(entry.item, entry.score);
			}
			cachedPattern = pattern;
		}
		return scores.get(candidate);
	};
}
