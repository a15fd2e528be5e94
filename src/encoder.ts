import { ConfigurationError } from "./errors";

const CHARSET_ALIASES: { [label: string]: BufferEncoding } = {
	"utf-8": "utf8",
	utf8: "utf8",
	"iso-8859-1": "latin1",
	"iso8859-1": "latin1",
	latin1: "latin1",
	"us-ascii": "ascii",
	ascii: "ascii",
	"utf-16le": "utf16le",
	utf16le: "utf16le",
};

/**
 * Resolve a charset label (e.g. "UTF-8", "ISO-8859-1") to a Node buffer encoding.
 */
export function normalizeCharset(name: string): BufferEncoding {
	const label = name.trim().toLowerCase();
	if (!Object.hasOwn(CHARSET_ALIASES, label)) {
		throw new ConfigurationError(`Unsupported charset: ${name}`);
	}
	return CHARSET_ALIASES[label];
}

// Highest code point of the single-byte charsets; anything above becomes "?"
const SINGLE_BYTE_LIMIT: { [encoding: string]: number } = {
	ascii: 0x7f,
	latin1: 0xff,
};

const REPLACEMENT = "?";

function representable(text: string, encoding: BufferEncoding): string {
	if (!Object.hasOwn(SINGLE_BYTE_LIMIT, encoding)) return text;
	const limit = SINGLE_BYTE_LIMIT[encoding];
	return Array.from(text, (ch) =>
		(ch.codePointAt(0) ?? 0) > limit ? REPLACEMENT : ch,
	).join("");
}

/**
 * Bytes for a resolved code point.
 * Values below 0x80 are sent as a single byte; anything above is a full
 * character in the session charset, or "?" when the charset cannot hold it.
 */
export function encodeCodePoint(
	codePoint: number,
	encoding: BufferEncoding,
): Uint8Array {
	if (codePoint < 0x80) {
		return Uint8Array.of(codePoint);
	}
	return encodeText(String.fromCodePoint(codePoint), encoding);
}

export function encodeText(text: string, encoding: BufferEncoding): Uint8Array {
	return Uint8Array.from(Buffer.from(representable(text, encoding), encoding));
}
