import type { ISnapshot } from "./types";

export interface Rect {
	x: number;
	y: number;
	width: number;
	height: number;
}

/**
 * Text inside a rectangle of the snapshot (x, y relative to the snapshot).
 * Rows outside the snapshot come back empty.
 */
export function cropText(snapshot: ISnapshot, rect: Rect): string {
	const lines = snapshot.text.split("\n");
	const result: string[] = [];

	for (let i = 0; i < rect.height; i++) {
		const y = rect.y + i;
		if (y >= 0 && y < lines.length) {
			const line = lines[y];
			const start = Math.max(0, Math.min(rect.x, line.length));
			const end = Math.max(0, Math.min(rect.x + rect.width, line.length));
			result.push(line.substring(start, end));
		} else {
			result.push("");
		}
	}

	return result.join("\n");
}
