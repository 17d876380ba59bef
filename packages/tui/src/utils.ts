import stringWidth from "string-width";

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function isPureAscii(str: string): boolean {
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) return false;
	}
	return true;
}

/**
 * Calculate the visible width of a string in terminal columns. Wide (East
 * Asian, emoji) characters take two columns.
 */
export function visibleWidth(str: string): number {
	if (!str) return 0;
	// Fast path: pure ASCII printable
	if (isPureAscii(str)) return str.length;
	return stringWidth(str);
}

/**
 * Keep the leading graphemes that fit in `width` columns. A wide grapheme that
 * would straddle the limit is dropped, so the result may be one column short.
 */
export function truncateToWidth(str: string, width: number): string {
	if (width <= 0) return "";
	if (isPureAscii(str)) return str.slice(0, width);
	let out = "";
	let used = 0;
	for (const { segment } of segmenter.segment(str)) {
		const segmentWidth = stringWidth(segment);
		if (used + segmentWidth > width) break;
		out += segment;
		used += segmentWidth;
	}
	return out;
}

/**
 * Number of characters (code points) in a string; the column the input cursor
 * sits at after the pattern.
 */
export function charCount(str: string): number {
	let count = 0;
	for (const _char of str) count++;
	return count;
}

/**
 * Remove the last character (code point) of a string.
 */
export function dropLastChar(str: string): string {
	if (!str) return str;
	const chars = Array.from(str);
	chars.pop();
	return chars.join("");
}
