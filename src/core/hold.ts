import type { HoldState, PieceKind } from './types';

export interface HoldResult {
  consumed: boolean;
  /** Kind to spawn next; null means "draw from the generator". */
  nextKind: PieceKind | null;
}

export class HoldSlot {
  readonly state: HoldState = { held: null, usedThisSpawn: false };

  hold(activeKind: PieceKind): HoldResult {
    if (this.state.usedThisSpawn) return { consumed: false, nextKind: null };

    const previous = this.state.held;
    this.state.held = activeKind;
    this.state.usedThisSpawn = true;
    return { consumed: true, nextKind: previous };
  }

  /** Called for pieces that arrive after a lock, never for hold swaps. */
  onSpawn(): void {
    this.state.usedThisSpawn = false;
  }

  reset(): void {
    this.state.held = null;
    this.state.usedThisSpawn = false;
  }
}
