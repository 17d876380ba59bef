import type { Key } from "node:readline";

/**
 * Modifier keys as bit flags. Combine with `|`, test with {@link hasOnlyModifiers}.
 */
export enum KeyModifiers {
	None = 0,
	Shift = 1 << 0,
	Ctrl = 1 << 1,
	Alt = 1 << 2,
}

export type NamedKey =
	| "enter"
	| "tab"
	| "backspace"
	| "delete"
	| "escape"
	| "up"
	| "down"
	| "left"
	| "right"
	| "home"
	| "end"
	| "pageup"
	| "pagedown";

/** Either a named key or a single printable character. */
export type KeyCode = NamedKey | { char: string };

export interface KeyEvent {
	type: "key";
	code: KeyCode;
	modifiers: KeyModifiers;
}

export interface ResizeEvent {
	type: "resize";
	width: number;
	height: number;
}

export type InputEvent = KeyEvent | ResizeEvent;

const NAMED_KEYS: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
	["return", "enter"],
	["enter", "enter"],
	["tab", "tab"],
	["backspace", "backspace"],
	["delete", "delete"],
	["escape", "escape"],
	["up", "up"],
	["down", "down"],
	["left", "left"],
	["right", "right"],
	["home", "home"],
	["end", "end"],
	["pageup", "pageup"],
	["pagedown", "pagedown"],
]);

/**
 * True when `modifiers` contains no flag outside `allowed`.
 */
export function hasOnlyModifiers(modifiers: KeyModifiers, allowed: KeyModifiers): boolean {
	return (modifiers & ~allowed) === 0;
}

/**
 * Check whether a string is exactly one printable character (one code point,
 * not a C0/C1 control and not DEL).
 */
export function isPrintableChar(text: string): boolean {
	const codePoint = text.codePointAt(0);
	if (codePoint === undefined) return false;
	if (String.fromCodePoint(codePoint).length !== text.length) return false;
	if (codePoint < 0x20 || codePoint === 0x7f) return false;
	return codePoint < 0x80 || codePoint > 0x9f;
}

export function keyEvent(code: KeyCode, modifiers: KeyModifiers = KeyModifiers.None): KeyEvent {
	return { type: "key", code, modifiers };
}

export function charKey(char: string, modifiers: KeyModifiers = KeyModifiers.None): KeyEvent {
	return keyEvent({ char }, modifiers);
}

/**
 * Check a key event against a named key or a character.
 */
export function isKey(event: KeyEvent, code: KeyCode): boolean {
	if (typeof code === "string") return event.code === code;
	return typeof event.code !== "string" && event.code.char === code.char;
}

/**
 * Translate a `node:readline` keypress into a {@link KeyEvent}.
 *
 * Returns undefined for sequences that map to neither a named key nor a
 * single character (function keys, mouse reports, unknown escapes).
 */
export function decodeKeypress(str: string | undefined, key: Key | undefined): KeyEvent | undefined {
	let modifiers: KeyModifiers = KeyModifiers.None;
	if (key?.shift) modifiers |= KeyModifiers.Shift;
	if (key?.ctrl) modifiers |= KeyModifiers.Ctrl;
	if (key?.meta) modifiers |= KeyModifiers.Alt;

	const name = key?.name;
	if (name) {
		const named = NAMED_KEYS.get(name);
		if (named) return keyEvent(named, modifiers);
		// Control and meta chords carry the letter in `name`, not in `str`
		if ((key?.ctrl || key?.meta) && isPrintableChar(name)) {
			return charKey(name, modifiers);
		}
	}

	if (str !== undefined && isPrintableChar(str)) {
		return charKey(str, modifiers);
	}
	return undefined;
}

/** Human readable form of a key event, used in debug logs. */
export function formatKey(event: KeyEvent): string {
	const parts: string[] = [];
	if (event.modifiers & KeyModifiers.Ctrl) parts.push("ctrl");
	if (event.modifiers & KeyModifiers.Alt) parts.push("alt");
	if (event.modifiers & KeyModifiers.Shift) parts.push("shift");
	parts.push(typeof event.code === "string" ? event.code : event.code.char);
	return parts.join("+");
}
