import { encodeCodePoint, encodeText, normalizeCharset } from "./encoder";
import { PreSessionInputError, TransportError } from "./errors";
import {
	DEFAULT_KEYMAP_PROFILE,
	type KeyCharacterMap,
	resolveKeyCharacterMap,
} from "./keyCharacterMap";
import { ctrlMap, FunctionKeyOverlay } from "./keymap";
import {
	type Modifier,
	ModifierState,
	type ModifierSnapshot,
} from "./modifiers";
import { type Cell, type Direction, SelectionArea } from "./selection";
import type {
	IClipboard,
	IDeviceState,
	IDisposable,
	IEmulation,
	IKeyboardSettings,
	IScreenBuffer,
	ISessionBridge,
	IUiHost,
	KeyboardContext,
	KeyEventDescriptor,
	ShortcutPreference,
	TransportPayload,
} from "./types";
import { EmulationModifier, KeyCodes, NativeMeta, TerminalKey } from "./types";
import type { Rect } from "./utils";

export interface TerminalKeyListenerOptions {
	bridge: ISessionBridge;
	emulation?: IEmulation;
	buffer?: IScreenBuffer;
	ui?: Partial<IUiHost>;
	clipboard?: IClipboard;
	settings?: Partial<IKeyboardSettings>;
	device?: Partial<IDeviceState>;
	/** Charset label for multi-byte output (default: "UTF-8") */
	encoding?: string;
}

const MODIFIER_KEYS: { [keyCode: string]: Modifier } = {
	[KeyCodes.ControlLeft]: "ctrl",
	[KeyCodes.ControlRight]: "ctrl",
	[KeyCodes.AltLeft]: "alt",
	[KeyCodes.AltRight]: "alt",
	[KeyCodes.ShiftLeft]: "shift",
	[KeyCodes.ShiftRight]: "rshift",
};

const ARROW_KEYS: { [keyCode: string]: [Direction, TerminalKey] } = {
	[KeyCodes.ArrowUp]: ["up", TerminalKey.Up],
	[KeyCodes.ArrowDown]: ["down", TerminalKey.Down],
	[KeyCodes.ArrowLeft]: ["left", TerminalKey.Left],
	[KeyCodes.ArrowRight]: ["right", TerminalKey.Right],
};

// Glyphs for Space/Tab when the active layout does not list them
const FALLBACK_GLYPHS: { [keyCode: string]: number } = {
	[KeyCodes.Space]: 0x20,
	[KeyCodes.Tab]: 0x09,
};

function lookup<T>(table: { [key: string]: T }, key: string): T | undefined {
	return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Translates key events into terminal input for one session.
 *
 * Owns the session's modifier and selection state; everything else
 * (transport, emulation engine, UI, clipboard, settings) is a collaborator.
 */
export class TerminalKeyListener {
	private readonly modifiers = new ModifierState();
	private readonly selection = new SelectionArea();

	private readonly bridge: ISessionBridge;
	private emulation: IEmulation | undefined;
	private buffer: IScreenBuffer | undefined;
	private clipboard: IClipboard | undefined;
	private readonly ui: Partial<IUiHost>;
	private readonly settings: Partial<IKeyboardSettings>;
	private readonly device: Partial<IDeviceState>;
	private encoding: BufferEncoding;

	private keymap: { profile: string; map: KeyCharacterMap } | undefined;
	private hardwareWasVisible: boolean;

	constructor(options: TerminalKeyListenerOptions) {
		this.bridge = options.bridge;
		this.emulation = options.emulation;
		this.buffer = options.buffer;
		this.clipboard = options.clipboard;
		this.ui = options.ui ?? {};
		this.settings = options.settings ?? {};
		this.device = options.device ?? {};
		this.encoding = normalizeCharset(options.encoding ?? "UTF-8");

		const ctx = this.readContext();
		this.hardwareWasVisible = ctx.hardwareKeyboard && !ctx.hardKeyboardHidden;
	}

	/**
	 * Handle one key event.
	 * @returns true when the event was consumed
	 */
	public onKey(
		source: string,
		keyCode: string,
		event: KeyEventDescriptor,
	): boolean {
		try {
			return this.dispatch(keyCode, event, this.readContext());
		} catch (error) {
			if (error instanceof TransportError) {
				console.error(
					`[TerminalKeyListener] Problem while handling key ${keyCode} from ${source}:`,
					error,
				);
				this.recoverTransport();
				return true;
			}
			if (error instanceof PreSessionInputError) {
				console.debug(
					`[TerminalKeyListener] Input before session established ignored (${source})`,
				);
				return true;
			}
			throw error;
		}
	}

	// --- Collaborators ---

	public attach(emulation: IEmulation, buffer?: IScreenBuffer): void {
		this.emulation = emulation;
		this.buffer = buffer;
	}

	public setClipboard(clipboard: IClipboard | undefined): void {
		this.clipboard = clipboard;
	}

	public setCharset(name: string): void {
		this.encoding = normalizeCharset(name);
	}

	public getCharset(): BufferEncoding {
		return this.encoding;
	}

	// --- Modifiers ---

	/**
	 * Cycle a modifier: momentary, then locked, then off.
	 */
	public applyModifier(modifier: Modifier): void {
		this.modifiers.apply(modifier);
		this.redraw();
	}

	public getModifierState(): ModifierSnapshot {
		return this.modifiers.snapshot();
	}

	public getEmulationModifiers(): number {
		return this.modifiers.toEmulationMask();
	}

	public onModifierChange(listener: (modifier: Modifier) => void): IDisposable {
		return this.modifiers.onChange(listener);
	}

	// --- Selection ---

	public startSelection(at?: Cell): void {
		this.selection.start(at);
		this.redraw();
	}

	public cancelSelection(): void {
		this.selection.reset();
		this.redraw();
	}

	public isSelecting(): boolean {
		return this.selection.active;
	}

	public getSelectionBounds(): Rect | undefined {
		return this.selection.active ? this.selection.getBounds() : undefined;
	}

	public sendEscape(): void {
		this.requireEmulation().dispatchTypedKey(
			TerminalKey.Escape,
			EmulationModifier.None,
		);
	}

	// --- Dispatch ---

	private dispatch(
		keyCode: string,
		event: KeyEventDescriptor,
		ctx: KeyboardContext,
	): boolean {
		const hardwareVisible = ctx.hardwareKeyboard && !ctx.hardKeyboardHidden;

		// Locks from soft-keyboard use must not leak into hardware input
		if (hardwareVisible) {
			if (this.hardwareWasVisible) {
				this.modifiers.clearLocks();
			} else {
				this.modifiers.clearAll();
			}
		}
		this.hardwareWasVisible = hardwareVisible;

		if (event.action === "up") {
			// Nothing here for soft keyboard users
			if (!hardwareVisible) return false;
			if (!this.isConnected()) return false;

			const modifier = lookup(MODIFIER_KEYS, keyCode);
			if (!modifier) return false;
			this.modifiers.release(modifier);
			return true;
		}

		// Terminal resizing keys
		if (keyCode === KeyCodes.VolumeUp) {
			this.ui.adjustFontSize?.(1);
			return true;
		}
		if (keyCode === KeyCodes.VolumeDown) {
			this.ui.adjustFontSize?.(-1);
			return true;
		}

		// Skip keys until connected, and after disconnect
		if (!this.isConnected()) return false;

		this.ui.resetScrollPosition?.();

		const keymap = this.resolveKeymap(ctx.keymapProfile);
		const printing =
			keymap.isPrintingKey(keyCode) ||
			keyCode === KeyCodes.Space ||
			keyCode === KeyCodes.Tab;

		if (printing) {
			this.sendPrintable(keyCode, event, ctx, keymap);
			return true;
		}

		if (keyCode === KeyCodes.Unknown && event.action === "multiple") {
			const text = event.characters ?? "";
			if (text.length > 0) {
				this.write(encodeText(text, ctx.encoding));
			}
			return true;
		}

		// Modifier shortcuts on a physical keyboard
		if (hardwareVisible && (event.repeatCount ?? 0) === 0) {
			const modifier = lookup(MODIFIER_KEYS, keyCode);
			if (modifier) {
				this.applyModifier(modifier);
				return true;
			}
		}

		return this.handleSpecialKey(keyCode, hardwareVisible);
	}

	private sendPrintable(
		keyCode: string,
		event: KeyEventDescriptor,
		ctx: KeyboardContext,
		keymap: KeyCharacterMap,
	): void {
		const hardwareVisible = ctx.hardwareKeyboard && !ctx.hardKeyboardHidden;
		let metaState = event.metaState ?? NativeMeta.None;

		// Soft keyboards send no key-up for our modifiers, so consume them here
		if (this.modifiers.isActive("shift")) {
			metaState |= NativeMeta.Shift;
			if (!hardwareVisible) this.modifiers.release("shift");
			this.redraw();
		}

		if (this.modifiers.isActive("alt")) {
			metaState |= NativeMeta.Alt;
			if (!hardwareVisible) this.modifiers.release("alt");
			this.redraw();
		}

		let key =
			keymap.isPrintingKey(keyCode) || !Object.hasOwn(FALLBACK_GLYPHS, keyCode)
				? keymap.get(keyCode, metaState)
				: FALLBACK_GLYPHS[keyCode];

		if (this.modifiers.isActive("ctrl")) {
			if (!hardwareVisible) this.modifiers.release("ctrl");
			this.redraw();
			key = ctrlMap(key);
		}

		if (
			hardwareVisible &&
			this.modifiers.isActive("rshift") &&
			this.sendFunctionKey(keyCode)
		) {
			return;
		}

		this.write(encodeCodePoint(key, ctx.encoding));
	}

	private sendFunctionKey(keyCode: string): boolean {
		const fkey = lookup(FunctionKeyOverlay, keyCode);
		if (!fkey) return false;
		this.requireEmulation().dispatchNamedKey(fkey, EmulationModifier.None);
		return true;
	}

	private handleSpecialKey(keyCode: string, hardwareVisible: boolean): boolean {
		const arrow = lookup(ARROW_KEYS, keyCode);
		if (arrow) {
			const [direction, key] = arrow;
			if (this.selection.active) {
				this.selection.step(direction);
				this.redraw();
			} else {
				this.requireEmulation().dispatchNamedKey(
					key,
					this.modifiers.toEmulationMask(),
				);
				if (!hardwareVisible) this.modifiers.clearTransient();
				this.ui.triggerHapticFeedback?.();
			}
			return true;
		}

		switch (keyCode) {
			case KeyCodes.Search:
				this.sendEscape();
				return true;

			case KeyCodes.Camera:
				// Shortcut goes out, but the key stays available to the host
				this.sendShortcut(
					this.settings.deviceShortcutPreference?.() ?? "ctrla-space",
				);
				return false;

			case KeyCodes.Backspace:
				this.requireEmulation().dispatchNamedKey(
					TerminalKey.Backspace,
					this.modifiers.toEmulationMask(),
				);
				if (!hardwareVisible) this.modifiers.clearTransient();
				return true;

			case KeyCodes.Enter:
				this.requireEmulation().dispatchTypedKey(
					TerminalKey.Enter,
					EmulationModifier.None,
				);
				if (!hardwareVisible) this.modifiers.clearTransient();
				return true;

			case KeyCodes.Center:
				if (this.selection.active) {
					if (this.selection.finalizeOrigin() === "ready") {
						this.copySelection();
					}
				} else if (this.modifiers.isOn("ctrl")) {
					this.sendEscape();
					if (!hardwareVisible) this.modifiers.release("ctrl");
				} else {
					this.modifiers.apply("ctrl");
				}
				this.redraw();
				return true;

			default:
				return false;
		}
	}

	private sendShortcut(preference: ShortcutPreference): void {
		switch (preference) {
			case "ctrla-space":
				this.write(0x01);
				this.write(0x20);
				break;
			case "ctrla":
				this.write(0x01);
				break;
			case "esc":
				this.sendEscape();
				break;
			case "esc-a":
				this.sendEscape();
				this.write(0x61);
				break;
			default: {
				const _never: never = preference;
				throw new Error(`Unsupported shortcut preference: ${String(_never)}`);
			}
		}
	}

	private copySelection(): void {
		if (!this.clipboard) {
			console.warn("[TerminalKeyListener] No clipboard attached, selection kept");
			return;
		}
		const buffer = this.buffer;
		if (!buffer) {
			throw new PreSessionInputError();
		}

		const text = this.selection.copyFrom(buffer.getSnapshot());
		this.clipboard.setText(text);
		this.selection.reset();
	}

	// --- Helpers ---

	private readContext(): KeyboardContext {
		return {
			hardwareKeyboard: this.device.hasHardwareKeyboard?.() ?? false,
			hardKeyboardHidden: !(this.device.isHardwareKeyboardVisible?.() ?? true),
			keymapProfile:
				this.settings.activeKeymapProfile?.() ?? DEFAULT_KEYMAP_PROFILE,
			encoding: this.encoding,
		};
	}

	private resolveKeymap(profile: string): KeyCharacterMap {
		if (!this.keymap || this.keymap.profile !== profile) {
			this.keymap = { profile, map: resolveKeyCharacterMap(profile) };
		}
		return this.keymap.map;
	}

	private isConnected(): boolean {
		return this.bridge.transport !== undefined && !this.bridge.isDisconnected();
	}

	private requireEmulation(): IEmulation {
		if (!this.emulation) {
			throw new PreSessionInputError();
		}
		return this.emulation;
	}

	private write(payload: TransportPayload): void {
		const transport = this.bridge.transport;
		if (!transport) {
			throw new PreSessionInputError();
		}
		transport.write(payload);
	}

	private redraw(): void {
		this.ui.requestRedraw?.();
	}

	private recoverTransport(): void {
		const transport = this.bridge.transport;
		try {
			transport?.flush();
		} catch (error) {
			console.warn(
				"[TerminalKeyListener] Transport was closed, dispatching disconnect:",
				error,
			);
			this.bridge.reportDisconnect();
		}
	}
}
