import {
  DEFAULT_GRAVITY_MS,
  DEFAULT_GRAVITY_STEP_MS,
  DEFAULT_MIN_GRAVITY_MS,
  DEFAULT_SOFT_DROP_FACTOR,
  DEFAULT_SOFT_DROP_MAX_MS,
  LINE_CLEAR_POINTS,
  LINES_PER_LEVEL,
} from './constants';
import type { ScoreState } from './types';

export interface GravityTiming {
  gravityMs: number;
  gravityStepMs: number;
  minGravityMs: number;
}

export interface SoftDropTiming {
  softDropFactor: number;
  softDropMaxMs: number;
}

export const DEFAULT_GRAVITY_TIMING: GravityTiming = {
  gravityMs: DEFAULT_GRAVITY_MS,
  gravityStepMs: DEFAULT_GRAVITY_STEP_MS,
  minGravityMs: DEFAULT_MIN_GRAVITY_MS,
};

export const DEFAULT_SOFT_DROP_TIMING: SoftDropTiming = {
  softDropFactor: DEFAULT_SOFT_DROP_FACTOR,
  softDropMaxMs: DEFAULT_SOFT_DROP_MAX_MS,
};

/** Milliseconds per gravity row at `level`, never below the floor. */
export function gravityIntervalMs(
  level: number,
  timing: GravityTiming = DEFAULT_GRAVITY_TIMING,
): number {
  return Math.max(
    timing.gravityMs - level * timing.gravityStepMs,
    timing.minGravityMs,
  );
}

export function softDropIntervalMs(
  baseMs: number,
  timing: SoftDropTiming = DEFAULT_SOFT_DROP_TIMING,
): number {
  return Math.min(timing.softDropMaxMs, baseMs * timing.softDropFactor);
}

export interface ClearResult {
  points: number;
  leveledUp: boolean;
}

export class ScoreTracker {
  readonly state: ScoreState = { score: 0, level: 0, lines: 0 };

  onLinesCleared(n: number): ClearResult {
    if (!Number.isInteger(n) || n < 0 || n >= LINE_CLEAR_POINTS.length) {
      return { points: 0, leveledUp: false };
    }

    const points = LINE_CLEAR_POINTS[n] * (this.state.level + 1);
    const before = this.state.level;
    this.state.score += points;
    this.state.lines += n;
    this.state.level = Math.floor(this.state.lines / LINES_PER_LEVEL);
    return { points, leveledUp: this.state.level > before };
  }

  addDropBonus(points: number): void {
    if (points > 0) this.state.score += points;
  }

  reset(): void {
    this.state.score = 0;
    this.state.level = 0;
    this.state.lines = 0;
  }
}
