/**
 * I/O failure while writing to or flushing a transport.
 */
export class TransportError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TransportError";
	}
}

/**
 * Input arrived before the session had an emulation engine or screen buffer attached.
 */
export class PreSessionInputError extends Error {
	constructor(message = "Input before session established") {
		super(message);
		this.name = "PreSessionInputError";
	}
}

export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}
