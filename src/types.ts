// Common disposable handle for listener registration
export interface IDisposable {
	dispose(): void;
}

// --- Transport ---

/** Raw payload accepted by a transport: text, bytes, or a single byte value. */
export type TransportPayload = string | Uint8Array | number;

// Abstract terminal backend (pty, ssh, ...). Owns the connection.
export interface ITerminalBackend extends IDisposable {
	// Lifecycle
	spawn(): Promise<void>;

	// I/O
	write(data: TransportPayload): void;
	flush(): void;
	resize(cols: number, rows: number): void;

	// Events
	onData(listener: (data: string) => void): IDisposable;
	onExit(listener: (code: number, signal?: number) => void): IDisposable;

	// Metadata
	readonly id: string | number;
	readonly processName: string;
}

/**
 * The part of a session the key listener talks to.
 * `transport` is undefined until the backend is attached.
 */
export interface ISessionBridge {
	readonly transport: ITerminalBackend | undefined;
	isDisconnected(): boolean;
	reportDisconnect(): void;
}

// --- Emulation engine ---

/** Keys the emulation engine knows how to encode. */
export enum TerminalKey {
	Escape = "Escape",
	Enter = "Enter",
	Backspace = "Backspace",
	Tab = "Tab",
	Up = "Up",
	Down = "Down",
	Left = "Left",
	Right = "Right",
	F1 = "F1",
	F2 = "F2",
	F3 = "F3",
	F4 = "F4",
	F5 = "F5",
	F6 = "F6",
	F7 = "F7",
	F8 = "F8",
	F9 = "F9",
	F10 = "F10",
	F11 = "F11",
	F12 = "F12",
}

/** Modifier bits passed to the emulation engine. */
export enum EmulationModifier {
	None = 0,
	Control = 0x01,
	Shift = 0x02,
	Alt = 0x04,
}

export interface IEmulation {
	/** Key-down semantics: modifier parameters are encoded into the sequence. */
	dispatchNamedKey(key: TerminalKey, modifiers: number): void;
	/** A single logical keystroke: plain sequence, Alt sent as an ESC prefix. */
	dispatchTypedKey(key: TerminalKey, modifiers: number): void;
}

// --- Snapshot ---

export type SnapshotRange = "viewport" | "all";

export interface SnapshotOptions {
	range?: SnapshotRange;
}

export interface ISnapshot {
	text: string;
	cursor: { x: number; y: number }; // Absolute (Buffer)
	cursorSnapshot: { x: number; y: number }; // Relative (Snapshot)
	meta: {
		isAlternateBuffer: boolean;
		viewportY: number;
		rows: number;
		cols: number;
		startRow: number;
		endRow: number;
		rangeUsed: SnapshotRange;
	};
}

export interface IScreenBuffer {
	getSnapshot(options?: SnapshotOptions): ISnapshot;
}

// --- Host collaborators ---

export interface IUiHost {
	requestRedraw(): void;
	adjustFontSize(delta: number): void;
	triggerHapticFeedback(): void;
	resetScrollPosition(): void;
}

export interface IClipboard {
	setText(text: string): void;
}

export type ShortcutPreference = "ctrla-space" | "ctrla" | "esc" | "esc-a";

export interface IKeyboardSettings {
	activeKeymapProfile(): string;
	deviceShortcutPreference(): ShortcutPreference;
}

export interface IDeviceState {
	hasHardwareKeyboard(): boolean;
	isHardwareKeyboardVisible(): boolean;
}

/** Snapshot of keyboard configuration taken at the start of each event. */
export interface KeyboardContext {
	readonly hardwareKeyboard: boolean;
	readonly hardKeyboardHidden: boolean;
	readonly keymapProfile: string;
	readonly encoding: BufferEncoding;
}

// --- Key events ---

export type KeyAction = "down" | "up" | "multiple";

/** Device-native modifier bits, as reported by the input source. */
export const NativeMeta = {
	None: 0,
	Shift: 0x1,
	Alt: 0x2,
	Ctrl: 0x1000,
} as const;

/** Bits the key character map looks at; Ctrl produces unprintable glyphs. */
export const NATIVE_GLYPH_MASK = NativeMeta.Shift | NativeMeta.Alt;

export interface KeyEventDescriptor {
	action: KeyAction;
	repeatCount?: number;
	metaState?: number;
	/** Decoded character batch for `multiple` events. */
	characters?: string;
}

/** Key codes with special handling. Printable keys use their layout code (e.g. "KeyA"). */
export const KeyCodes = {
	Unknown: "Unknown",
	Space: "Space",
	Tab: "Tab",
	Enter: "Enter",
	Backspace: "Backspace",
	ArrowUp: "ArrowUp",
	ArrowDown: "ArrowDown",
	ArrowLeft: "ArrowLeft",
	ArrowRight: "ArrowRight",
	Center: "Center",
	ShiftLeft: "ShiftLeft",
	ShiftRight: "ShiftRight",
	ControlLeft: "ControlLeft",
	ControlRight: "ControlRight",
	AltLeft: "AltLeft",
	AltRight: "AltRight",
	VolumeUp: "AudioVolumeUp",
	VolumeDown: "AudioVolumeDown",
	Search: "Search",
	Camera: "Camera",
} as const;

// --- High Level API Types (Keywire) ---

export type BackendConfig = {
	type: "localPty";
	file?: string;
	args?: string[];
	cwd?: string;
	env?: NodeJS.ProcessEnv;
};

export interface KeywireLaunchOptions {
	cols?: number;
	rows?: number;
	backend: BackendConfig | ITerminalBackend;
	/** Charset label for multi-byte output (default: "UTF-8") */
	encoding?: string;
	ui?: Partial<IUiHost>;
	clipboard?: IClipboard;
	settings?: Partial<IKeyboardSettings>;
	device?: Partial<IDeviceState>;
}
