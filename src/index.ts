export { LocalPty, type LocalPtyOptions } from "./backend/LocalPty";
export { createBackend, isTerminalBackend } from "./backendFactory";
export { XtermEmulation } from "./emulation";
export { encodeCodePoint, encodeText, normalizeCharset } from "./encoder";
export {
	ConfigurationError,
	PreSessionInputError,
	TransportError,
} from "./errors";
export {
	createKeyCharacterMap,
	DEFAULT_KEYMAP_PROFILE,
	isKeyLayout,
	type KeyCharacterMap,
	type KeyGlyphs,
	type KeyLayout,
	registerLayout,
	resolveKeyCharacterMap,
} from "./keyCharacterMap";
export {
	ctrlMap,
	FunctionKeyOverlay,
	getCtrlChar,
	sequenceFor,
	TerminalKeySequences,
	xtermModifierParam,
} from "./keymap";
export { Keywire } from "./keywire";
export { TerminalKeyListener, type TerminalKeyListenerOptions } from "./listener";
export {
	type Modifier,
	type ModifierBits,
	MODIFIERS,
	type ModifierSnapshot,
	ModifierState,
} from "./modifiers";
export {
	type Cell,
	type Direction,
	SelectionArea,
	type SelectionMode,
} from "./selection";
export { TerminalSession, type TerminalSessionOptions } from "./session";
export * from "./types";
export { cropText, type Rect } from "./utils";
