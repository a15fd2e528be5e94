import { ConfigurationError } from "./errors";
import usLayout from "./layouts/us.json";
import { NATIVE_GLYPH_MASK, NativeMeta } from "./types";

/** [unshifted, shifted] glyphs of one key */
export type KeyGlyphs = [string, string];

export interface KeyLayout {
	id: string;
	name?: string;
	keys: { [keyCode: string]: KeyGlyphs };
	/** Glyphs produced while Alt is held; keys missing here fall back to `keys`. */
	alt?: { [keyCode: string]: KeyGlyphs };
}

export interface KeyCharacterMap {
	readonly id: string;
	isPrintingKey(keyCode: string): boolean;
	/**
	 * Code point for a key under the given native modifier bits.
	 * Returns 0 when the key has no glyph.
	 */
	get(keyCode: string, metaState: number): number;
}

function isGlyphTable(x: unknown): x is { [keyCode: string]: KeyGlyphs } {
	if (typeof x !== "object" || x === null) return false;
	return Object.values(x).every(
		(v) =>
			Array.isArray(v) &&
			v.length === 2 &&
			v.every((g) => typeof g === "string" && g.length > 0),
	);
}

export function isKeyLayout(x: unknown): x is KeyLayout {
	if (typeof x !== "object" || x === null) return false;
	const o = x as Record<string, unknown>;
	return (
		typeof o.id === "string" &&
		isGlyphTable(o.keys) &&
		(o.alt === undefined || isGlyphTable(o.alt))
	);
}

export function createKeyCharacterMap(layout: KeyLayout): KeyCharacterMap {
	return {
		id: layout.id,

		isPrintingKey(keyCode: string): boolean {
			return Object.hasOwn(layout.keys, keyCode);
		},

		get(keyCode: string, metaState: number): number {
			if (!Object.hasOwn(layout.keys, keyCode)) return 0;
			const base = layout.keys[keyCode];

			const meta = metaState & NATIVE_GLYPH_MASK;
			const altGlyphs =
				layout.alt && Object.hasOwn(layout.alt, keyCode)
					? layout.alt[keyCode]
					: undefined;
			const glyphs = meta & NativeMeta.Alt && altGlyphs ? altGlyphs : base;
			const glyph = meta & NativeMeta.Shift ? glyphs[1] : glyphs[0];
			return glyph.codePointAt(0) ?? 0;
		},
	};
}

export const DEFAULT_KEYMAP_PROFILE = "us";

const registry = new Map<string, KeyCharacterMap>();

export function registerLayout(layout: unknown): KeyCharacterMap {
	if (!isKeyLayout(layout)) {
		throw new ConfigurationError("Invalid key layout");
	}
	const keymap = createKeyCharacterMap(layout);
	registry.set(layout.id, keymap);
	return keymap;
}

registerLayout(usLayout);

/**
 * Key character map for a keymap profile id.
 * Unknown ids fall back to the default layout.
 */
export function resolveKeyCharacterMap(profile: string): KeyCharacterMap {
	const keymap = registry.get(profile);
	if (keymap) return keymap;

	console.warn(
		`[KeyCharacterMap] Unknown keymap profile "${profile}", using "${DEFAULT_KEYMAP_PROFILE}"`,
	);
	const fallback = registry.get(DEFAULT_KEYMAP_PROFILE);
	if (!fallback) {
		throw new ConfigurationError(
			`Default keymap profile "${DEFAULT_KEYMAP_PROFILE}" is not registered`,
		);
	}
	return fallback;
}
