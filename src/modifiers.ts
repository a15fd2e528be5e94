import type { IDisposable } from "./types";
import { EmulationModifier } from "./types";

export type Modifier = "ctrl" | "alt" | "shift" | "rshift";

export const MODIFIERS: readonly Modifier[] = ["ctrl", "alt", "shift", "rshift"];

export interface ModifierBits {
	on: boolean;
	lock: boolean;
}

export type ModifierSnapshot = Readonly<Record<Modifier, Readonly<ModifierBits>>>;

/**
 * Momentary (`on`) and sticky (`lock`) state per modifier.
 *
 * Tapping a modifier cycles it:
 * 1st press: next key gets the modifier
 * 2nd press: modifier is locked on
 * 3rd press: modifier is off
 */
export class ModifierState {
	private readonly bits: Record<Modifier, ModifierBits> = {
		ctrl: { on: false, lock: false },
		alt: { on: false, lock: false },
		shift: { on: false, lock: false },
		rshift: { on: false, lock: false },
	};

	private changeListeners: ((modifier: Modifier) => void)[] = [];

	public apply(modifier: Modifier): void {
		const m = this.bits[modifier];
		if (m.lock) {
			m.lock = false;
		} else if (m.on) {
			m.on = false;
			m.lock = true;
		} else {
			m.on = true;
		}
		this.emitChange(modifier);
	}

	public isActive(modifier: Modifier): boolean {
		const m = this.bits[modifier];
		return m.on || m.lock;
	}

	public isOn(modifier: Modifier): boolean {
		return this.bits[modifier].on;
	}

	public isLocked(modifier: Modifier): boolean {
		return this.bits[modifier].lock;
	}

	/** Clear the momentary bit of one modifier (physical key-up). */
	public release(modifier: Modifier): void {
		if (!this.bits[modifier].on) return;
		this.bits[modifier].on = false;
		this.emitChange(modifier);
	}

	/** Clear every momentary bit. Locked modifiers stay active. */
	public clearTransient(): void {
		for (const mod of MODIFIERS) {
			this.release(mod);
		}
	}

	public clearLocks(): void {
		for (const mod of MODIFIERS) {
			if (this.bits[mod].lock) {
				this.bits[mod].lock = false;
				this.emitChange(mod);
			}
		}
	}

	public clearAll(): void {
		this.clearLocks();
		this.clearTransient();
	}

	/** Modifier bits for the emulation engine. Right-Shift has no counterpart there. */
	public toEmulationMask(): number {
		let mask: number = EmulationModifier.None;
		if (this.isActive("ctrl")) mask |= EmulationModifier.Control;
		if (this.isActive("shift")) mask |= EmulationModifier.Shift;
		if (this.isActive("alt")) mask |= EmulationModifier.Alt;
		return mask;
	}

	public snapshot(): ModifierSnapshot {
		return {
			ctrl: { ...this.bits.ctrl },
			alt: { ...this.bits.alt },
			shift: { ...this.bits.shift },
			rshift: { ...this.bits.rshift },
		};
	}

	public onChange(listener: (modifier: Modifier) => void): IDisposable {
		this.changeListeners.push(listener);
		return {
			dispose: () => {
				this.changeListeners = this.changeListeners.filter(
					(l) => l !== listener,
				);
			},
		};
	}

	private emitChange(modifier: Modifier): void {
		this.changeListeners.forEach((listener) => {
			listener(modifier);
		});
	}
}
