import type { ISnapshot } from "./types";
import { cropText, type Rect } from "./utils";

export interface Cell {
	col: number;
	row: number;
}

export type Direction = "up" | "down" | "left" | "right";

export type SelectionMode = "idle" | "origin" | "extent";

const STEPS: Record<Direction, Cell> = {
	up: { col: 0, row: -1 },
	down: { col: 0, row: 1 },
	left: { col: -1, row: 0 },
	right: { col: 1, row: 0 },
};

/**
 * Rectangular copy region driven by directional keys.
 *
 * idle -> origin (start) -> extent (finalizeOrigin) -> idle (copy or reset)
 *
 * Cells are not bounds-checked here; extraction clamps to the snapshot.
 */
export class SelectionArea {
	private origin: Cell | undefined;
	private current: Cell = { col: 0, row: 0 };
	private _mode: SelectionMode = "idle";

	public get mode(): SelectionMode {
		return this._mode;
	}

	public get active(): boolean {
		return this._mode !== "idle";
	}

	public isSelectingOrigin(): boolean {
		return this._mode === "origin";
	}

	public start(at: Cell = { col: 0, row: 0 }): void {
		this.origin = undefined;
		this.current = { ...at };
		this._mode = "origin";
	}

	public step(direction: Direction): void {
		if (!this.active) return;
		const delta = STEPS[direction];
		this.current = {
			col: this.current.col + delta.col,
			row: this.current.row + delta.row,
		};
	}

	/**
	 * First call pins the origin at the current cell and returns "origin-set".
	 * Once the origin is pinned, returns "ready": the region can be copied.
	 */
	public finalizeOrigin(): "origin-set" | "ready" | "idle" {
		switch (this._mode) {
			case "idle":
				return "idle";
			case "origin":
				this.origin = { ...this.current };
				this._mode = "extent";
				return "origin-set";
			case "extent":
				return "ready";
		}
	}

	public getOrigin(): Cell | undefined {
		return this.origin ? { ...this.origin } : undefined;
	}

	public getCurrent(): Cell {
		return { ...this.current };
	}

	/** Inclusive rectangle between origin (or current, while choosing it) and current. */
	public getBounds(): Rect {
		const anchor = this.origin ?? this.current;
		const left = Math.min(anchor.col, this.current.col);
		const top = Math.min(anchor.row, this.current.row);
		return {
			x: left,
			y: top,
			width: Math.abs(anchor.col - this.current.col) + 1,
			height: Math.abs(anchor.row - this.current.row) + 1,
		};
	}

	/** Text under the region, each row right-trimmed. */
	public copyFrom(snapshot: ISnapshot): string {
		return cropText(snapshot, this.getBounds())
			.split("\n")
			.map((line) => line.trimEnd())
			.join("\n");
	}

	public reset(): void {
		this.origin = undefined;
		this.current = { col: 0, row: 0 };
		this._mode = "idle";
	}
}
