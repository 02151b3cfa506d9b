import { DCA_COUNT, type DcaSlot } from "./types.js";

const EMPTY_SLOT: DcaSlot = Object.freeze({ channels: null, label: null });

export function emptySnapshot(): DcaSlot[] {
  return Array.from({ length: DCA_COUNT }, () => EMPTY_SLOT);
}

/** Frozen copy of a working snapshot, safe to hand out in a cue. */
export function freezeSnapshot(slots: readonly DcaSlot[]): readonly DcaSlot[] {
  return Object.freeze(slots.map((slot) => Object.freeze({ channels: slot.channels, label: slot.label })));
}

/**
 * Free DCA numbers 1..size. Allocation always takes the lowest free number so
 * the same script yields the same assignments on every run.
 */
export class SlotPool {
  private readonly free: Set<number>;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1 || size > DCA_COUNT) {
      throw new Error(`DCA slot count must be an integer in 1..${DCA_COUNT}, got ${size}`);
    }
    this.free = new Set(Array.from({ length: size }, (_, i) => i + 1));
  }

  /** Lowest free DCA number, or null when every slot is bound. */
  take(): number | null {
    if (this.free.size === 0) return null;
    const dca = Math.min(...this.free);
    this.free.delete(dca);
    return dca;
  }

  release(dca: number): void {
    if (dca < 1 || dca > this.size) return;
    this.free.add(dca);
  }

  isFree(dca: number): boolean {
    return this.free.has(dca);
  }

  get available(): number {
    return this.free.size;
  }
}
