import { EmulationModifier, TerminalKey } from "./types";

interface KeySequenceSpec {
	/** Sequence sent without modifiers */
	plain: string;
	/** Sequence in application cursor keys mode (DECCKM) */
	application?: string;
	/** CSI form used when modifiers are present: ESC [ param ; mod final */
	modified?: { param: number; final: string };
}

export const TerminalKeySequences: Record<TerminalKey, KeySequenceSpec> = {
	[TerminalKey.Escape]: { plain: "\x1b" },
	[TerminalKey.Enter]: { plain: "\r" },
	[TerminalKey.Backspace]: { plain: "\x7f" },
	[TerminalKey.Tab]: { plain: "\t" },

	// Cursor
	[TerminalKey.Up]: {
		plain: "\x1b[A",
		application: "\x1bOA",
		modified: { param: 1, final: "A" },
	},
	[TerminalKey.Down]: {
		plain: "\x1b[B",
		application: "\x1bOB",
		modified: { param: 1, final: "B" },
	},
	[TerminalKey.Right]: {
		plain: "\x1b[C",
		application: "\x1bOC",
		modified: { param: 1, final: "C" },
	},
	[TerminalKey.Left]: {
		plain: "\x1b[D",
		application: "\x1bOD",
		modified: { param: 1, final: "D" },
	},

	// Function Keys (Standard xterm)
	[TerminalKey.F1]: { plain: "\x1bOP", modified: { param: 1, final: "P" } },
	[TerminalKey.F2]: { plain: "\x1bOQ", modified: { param: 1, final: "Q" } },
	[TerminalKey.F3]: { plain: "\x1bOR", modified: { param: 1, final: "R" } },
	[TerminalKey.F4]: { plain: "\x1bOS", modified: { param: 1, final: "S" } },
	[TerminalKey.F5]: { plain: "\x1b[15~", modified: { param: 15, final: "~" } },
	[TerminalKey.F6]: { plain: "\x1b[17~", modified: { param: 17, final: "~" } },
	[TerminalKey.F7]: { plain: "\x1b[18~", modified: { param: 18, final: "~" } },
	[TerminalKey.F8]: { plain: "\x1b[19~", modified: { param: 19, final: "~" } },
	[TerminalKey.F9]: { plain: "\x1b[20~", modified: { param: 20, final: "~" } },
	[TerminalKey.F10]: { plain: "\x1b[21~", modified: { param: 21, final: "~" } },
	[TerminalKey.F11]: { plain: "\x1b[23~", modified: { param: 23, final: "~" } },
	[TerminalKey.F12]: { plain: "\x1b[24~", modified: { param: 24, final: "~" } },
};

// Digit row under right-Shift
export const FunctionKeyOverlay: { [keyCode: string]: TerminalKey } = {
	Digit1: TerminalKey.F1,
	Digit2: TerminalKey.F2,
	Digit3: TerminalKey.F3,
	Digit4: TerminalKey.F4,
	Digit5: TerminalKey.F5,
	Digit6: TerminalKey.F6,
	Digit7: TerminalKey.F7,
	Digit8: TerminalKey.F8,
	Digit9: TerminalKey.F9,
	Digit0: TerminalKey.F10,
};

/**
 * xterm modifier parameter: 1 + Shift(1) + Alt(2) + Ctrl(4).
 */
export function xtermModifierParam(modifiers: number): number {
	let param = 1;
	if (modifiers & EmulationModifier.Shift) param += 1;
	if (modifiers & EmulationModifier.Alt) param += 2;
	if (modifiers & EmulationModifier.Control) param += 4;
	return param;
}

export interface SequenceOptions {
	applicationCursor?: boolean;
}

export function sequenceFor(
	key: TerminalKey,
	modifiers: number,
	options: SequenceOptions = {},
): string {
	const spec = TerminalKeySequences[key];
	const param = xtermModifierParam(modifiers);

	if (spec.modified && param > 1) {
		return `\x1b[${spec.modified.param};${param}${spec.modified.final}`;
	}

	let seq =
		options.applicationCursor && spec.application
			? spec.application
			: spec.plain;

	if (key === TerminalKey.Backspace && modifiers & EmulationModifier.Control) {
		seq = "\b";
	}
	if (key === TerminalKey.Tab && modifiers & EmulationModifier.Shift) {
		seq = "\x1b[Z";
	}
	if (modifiers & EmulationModifier.Alt) {
		seq = `\x1b${seq}`;
	}
	return seq;
}

/**
 * Control-character remapping of a resolved code point.
 * e.g. 0x61 ('a') -> 0x01, 0x3F ('?') -> 0x7F
 */
export function ctrlMap(code: number): number {
	if (code >= 0x61 && code <= 0x7a) return code - 0x60; // a-z
	if (code >= 0x41 && code <= 0x5f) return code - 0x40; // A-Z [ \ ] ^ _
	if (code === 0x20) return 0x00;
	if (code === 0x3f) return 0x7f;
	return code;
}

// Helper to convert Control+Char to a control character
// e.g. 'c' -> '\x03'
export function getCtrlChar(char: string): string {
	const code = char.codePointAt(0);
	if (code === undefined) return char;
	return String.fromCodePoint(ctrlMap(code));
}
