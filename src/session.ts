import { Terminal } from "@xterm/headless";
import { XtermEmulation } from "./emulation";
import { TerminalKeyListener } from "./listener";
import type {
	IClipboard,
	IDeviceState,
	IDisposable,
	IKeyboardSettings,
	IScreenBuffer,
	ISessionBridge,
	ISnapshot,
	ITerminalBackend,
	IUiHost,
	KeyEventDescriptor,
	SnapshotOptions,
	TransportPayload,
} from "./types";

export interface TerminalSessionOptions {
	cols?: number;
	rows?: number;
	/** Charset label for multi-byte key output (default: "UTF-8") */
	encoding?: string;
	ui?: Partial<IUiHost>;
	clipboard?: IClipboard;
	settings?: Partial<IKeyboardSettings>;
	device?: Partial<IDeviceState>;
}

/**
 * One terminal session: backend output feeds a headless xterm, and key
 * events go through the key listener to the backend.
 */
export class TerminalSession
	implements IDisposable, ISessionBridge, IScreenBuffer
{
	public readonly keys: TerminalKeyListener;
	public readonly emulation: XtermEmulation;

	private terminal: Terminal;
	private backend: ITerminalBackend;
	private disposables: IDisposable[] = [];
	private disposed = false;
	private disconnected = false;

	// xterm.write is asynchronous; track pending writes so drain() can wait for them
	private pendingTerminalWrites = 0;
	private drainWaiters: (() => void)[] = [];

	private outputListeners: ((data: string) => void)[] = [];
	private exitListeners: ((code: number, signal?: number) => void)[] = [];
	private disconnectListeners: (() => void)[] = [];

	constructor(backend: ITerminalBackend, options: TerminalSessionOptions = {}) {
		this.backend = backend;

		this.terminal = new Terminal({
			allowProposedApi: true,
			cols: options.cols ?? 80,
			rows: options.rows ?? 24,
			scrollback: 5000,
		});

		this.emulation = new XtermEmulation(this.terminal, this);
		this.keys = new TerminalKeyListener({
			bridge: this,
			emulation: this.emulation,
			buffer: this.emulation,
			ui: options.ui,
			clipboard: options.clipboard,
			settings: options.settings,
			device: options.device,
			encoding: options.encoding,
		});

		const dataDisposable = this.backend.onData((data) => {
			this.pendingTerminalWrites++;
			this.terminal.write(data, () => {
				this.pendingTerminalWrites = Math.max(
					0,
					this.pendingTerminalWrites - 1,
				);
				if (this.pendingTerminalWrites === 0) {
					const waiters = this.drainWaiters;
					this.drainWaiters = [];
					waiters.forEach((w) => {
						w();
					});
				}
			});

			this.outputListeners.forEach((listener) => {
				listener(data);
			});
		});
		this.disposables.push(dataDisposable);

		const exitDisposable = this.backend.onExit((code, signal) => {
			this.exitListeners.forEach((listener) => {
				listener(code, signal);
			});
			this.reportDisconnect();
		});
		this.disposables.push(exitDisposable);
	}

	// --- Session bridge ---

	public get transport(): ITerminalBackend | undefined {
		return this.disposed ? undefined : this.backend;
	}

	public isDisconnected(): boolean {
		return this.disconnected;
	}

	public reportDisconnect(): void {
		if (this.disconnected) return;
		this.disconnected = true;
		this.disconnectListeners.forEach((listener) => {
			listener();
		});
	}

	// --- Key input ---

	/**
	 * Entry point for key events from an input source.
	 * @returns true when the event was consumed
	 */
	public onKeyEvent(
		source: string,
		keyCode: string,
		event: KeyEventDescriptor,
	): boolean {
		return this.keys.onKey(source, keyCode, event);
	}

	/**
	 * Simulate a key press and release.
	 * @param keyCode key code (e.g. 'KeyA', 'Enter', 'ArrowUp')
	 * @returns whether the key-down was consumed
	 */
	public press(keyCode: string, metaState?: number): boolean {
		const consumed = this.onKeyEvent("press", keyCode, {
			action: "down",
			metaState,
		});
		this.onKeyEvent("press", keyCode, { action: "up", metaState });
		return consumed;
	}

	/**
	 * Send a character batch, as an input method commits it.
	 */
	public type(text: string): boolean {
		return this.onKeyEvent("type", "Unknown", {
			action: "multiple",
			characters: text,
		});
	}

	// --- Programmatic I/O ---

	public write(data: TransportPayload): void {
		this.backend.write(data);
	}

	public resize(cols: number, rows: number): void {
		const c = Math.max(2, cols); // Minimum 2 cols for safety
		const r = Math.max(1, rows);

		this.terminal.resize(c, r);
		this.backend.resize(c, r);
	}

	/**
	 * Wait until data already received from the backend is reflected in the buffer.
	 */
	public drain(): Promise<void> {
		if (this.disposed) return Promise.resolve();
		if (this.pendingTerminalWrites === 0) return Promise.resolve();
		return new Promise((resolve) => {
			this.drainWaiters.push(resolve);
		});
	}

	public getSnapshot(options: SnapshotOptions = {}): ISnapshot {
		return this.emulation.getSnapshot(options);
	}

	// --- Event Listeners ---

	public onOutput(listener: (data: string) => void): IDisposable {
		this.outputListeners.push(listener);
		return {
			dispose: () => {
				this.outputListeners = this.outputListeners.filter(
					(l) => l !== listener,
				);
			},
		};
	}

	public onExit(
		listener: (code: number, signal?: number) => void,
	): IDisposable {
		this.exitListeners.push(listener);
		return {
			dispose: () => {
				this.exitListeners = this.exitListeners.filter((l) => l !== listener);
			},
		};
	}

	public onDisconnect(listener: () => void): IDisposable {
		this.disconnectListeners.push(listener);
		return {
			dispose: () => {
				this.disconnectListeners = this.disconnectListeners.filter(
					(l) => l !== listener,
				);
			},
		};
	}

	public dispose(): void {
		this.disposed = true;

		this.disposables.forEach((d) => {
			d.dispose();
		});
		this.disposables = [];
		this.outputListeners = [];
		this.exitListeners = [];
		this.disconnectListeners = [];

		const waiters = this.drainWaiters;
		this.drainWaiters = [];
		waiters.forEach((w) => {
			w();
		});

		this.backend.dispose();
		this.terminal.dispose();
	}
}
