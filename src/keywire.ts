import { createBackend } from "./backendFactory";
import { normalizeCharset } from "./encoder";
import type { Modifier, ModifierSnapshot } from "./modifiers";
import type { Cell } from "./selection";
import { TerminalSession } from "./session";
import type {
	IDisposable,
	ISnapshot,
	ITerminalBackend,
	KeyEventDescriptor,
	KeywireLaunchOptions,
	SnapshotOptions,
	TransportPayload,
} from "./types";

export class Keywire implements IDisposable {
	public readonly session: TerminalSession;
	public readonly backend: ITerminalBackend;

	private constructor(session: TerminalSession, backend: ITerminalBackend) {
		this.session = session;
		this.backend = backend;
	}

	/**
	 * Creates and launches a new Keywire instance.
	 */
	public static async launch(options: KeywireLaunchOptions): Promise<Keywire> {
		const encoding = normalizeCharset(options.encoding ?? "UTF-8");
		const backend = createBackend(options.backend, {
			cols: options.cols,
			rows: options.rows,
			encoding,
		});

		const session = new TerminalSession(backend, {
			cols: options.cols,
			rows: options.rows,
			encoding,
			ui: options.ui,
			clipboard: options.clipboard,
			settings: options.settings,
			device: options.device,
		});

		// Spawn AFTER wiring session listeners (to avoid losing early output).
		await backend.spawn();

		return new Keywire(session, backend);
	}

	public dispose(): void {
		this.session.dispose();
	}

	// --- Delegation Methods ---

	public onKeyEvent(
		source: string,
		keyCode: string,
		event: KeyEventDescriptor,
	): boolean {
		return this.session.onKeyEvent(source, keyCode, event);
	}

	public press(keyCode: string, metaState?: number): boolean {
		return this.session.press(keyCode, metaState);
	}

	public type(text: string): boolean {
		return this.session.type(text);
	}

	public applyModifier(modifier: Modifier): void {
		this.session.keys.applyModifier(modifier);
	}

	public getModifierState(): ModifierSnapshot {
		return this.session.keys.getModifierState();
	}

	public startSelection(at?: Cell): void {
		this.session.keys.startSelection(at);
	}

	public cancelSelection(): void {
		this.session.keys.cancelSelection();
	}

	public write(data: TransportPayload): void {
		this.session.write(data);
	}

	public resize(cols: number, rows: number): void {
		this.session.resize(cols, rows);
	}

	public getSnapshot(options?: SnapshotOptions): ISnapshot {
		return this.session.getSnapshot(options);
	}

	public onOutput(listener: (data: string) => void): IDisposable {
		return this.session.onOutput(listener);
	}

	public onExit(
		listener: (code: number, signal?: number) => void,
	): IDisposable {
		return this.session.onExit(listener);
	}

	public onDisconnect(listener: () => void): IDisposable {
		return this.session.onDisconnect(listener);
	}

	public drain(): Promise<void> {
		return this.session.drain();
	}
}
