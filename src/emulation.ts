import type { Terminal } from "@xterm/headless";
import { PreSessionInputError } from "./errors";
import { sequenceFor } from "./keymap";
import type {
	IEmulation,
	IScreenBuffer,
	ISessionBridge,
	ISnapshot,
	SnapshotOptions,
	TerminalKey,
} from "./types";
import { EmulationModifier } from "./types";

/**
 * Emulation engine backed by a headless xterm.
 *
 * Key sequences follow the terminal's current modes (application cursor keys)
 * and go straight to the session transport.
 */
export class XtermEmulation implements IEmulation, IScreenBuffer {
	constructor(
		private readonly terminal: Terminal,
		private readonly bridge: Pick<ISessionBridge, "transport">,
	) {}

	public dispatchNamedKey(key: TerminalKey, modifiers: number): void {
		this.send(
			sequenceFor(key, modifiers, {
				applicationCursor: this.terminal.modes.applicationCursorKeysMode,
			}),
		);
	}

	public dispatchTypedKey(key: TerminalKey, modifiers: number): void {
		this.send(
			sequenceFor(key, modifiers & EmulationModifier.Alt, {
				applicationCursor: this.terminal.modes.applicationCursorKeysMode,
			}),
		);
	}

	public getSnapshot(options: SnapshotOptions = {}): ISnapshot {
		const buffer = this.terminal.buffer.active;
		const range = options.range ?? "viewport";

		const viewportY = buffer.viewportY;
		let startRow = 0;
		let endRow = buffer.length;

		if (range === "viewport") {
			startRow = viewportY;
			endRow = Math.min(buffer.length, startRow + this.terminal.rows);
		}

		const lines: string[] = [];
		for (let i = startRow; i < endRow; i++) {
			const line = buffer.getLine(i);
			// Right-trimmed rows; a missing row is an empty line
			lines.push(line ? line.translateToString(true) : "");
		}

		const cursorX = buffer.cursorX;
		const cursorY = buffer.cursorY;

		return {
			text: lines.join("\n"),
			cursor: { x: cursorX, y: cursorY },
			cursorSnapshot: { x: cursorX, y: cursorY - startRow },
			meta: {
				isAlternateBuffer: buffer.type === "alternate",
				viewportY,
				rows: this.terminal.rows,
				cols: this.terminal.cols,
				startRow,
				endRow,
				rangeUsed: range,
			},
		};
	}

	private send(sequence: string): void {
		const transport = this.bridge.transport;
		if (!transport) {
			throw new PreSessionInputError();
		}
		transport.write(sequence);
	}
}
