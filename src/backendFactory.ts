import { LocalPty } from "./backend/LocalPty";
import { ConfigurationError } from "./errors";
import type { BackendConfig, ITerminalBackend } from "./types";

export function isTerminalBackend(x: unknown): x is ITerminalBackend {
	if (typeof x !== "object" || x === null) return false;
	const o = x as Record<string, unknown>;
	const requiredFns = [
		"spawn",
		"write",
		"flush",
		"resize",
		"onData",
		"onExit",
		"dispose",
	] as const;
	return requiredFns.every((k) => typeof o[k] === "function");
}

export function createBackend(
	backend: BackendConfig | ITerminalBackend,
	options: { cols?: number; rows?: number; encoding?: BufferEncoding },
): ITerminalBackend {
	// If an instance is provided, use as-is (duck typing)
	if (isTerminalBackend(backend)) return backend;

	if (backend.type === "localPty") {
		// node-pty writes UTF-8 whatever the stream encoding
		const encoding = options.encoding ?? "utf8";
		if (encoding !== "utf8") {
			throw new ConfigurationError(
				`localPty only carries UTF-8 input (requested: ${encoding})`,
			);
		}
		const isWin = process.platform === "win32";
		const file = backend.file ?? (isWin ? "powershell.exe" : "bash");
		const args = backend.args ?? [];
		return new LocalPty(file, args, {
			cols: options.cols,
			rows: options.rows,
			cwd: backend.cwd,
			env: backend.env,
		});
	}

	// Exhaustiveness guard for future backend types
	const _never: never = backend;
	throw new Error(`Unsupported backend config: ${JSON.stringify(_never)}`);
}
