import { FIXED_STEP_MS } from './constants';
import type { Game } from './game';
import { EMPTY_INPUT, type GameState, type InputFrame } from './types';

export interface InputSource {
  sample(state: GameState, dtMs: number): InputFrame;
}

export const NullInputSource: InputSource = {
  sample: () => EMPTY_INPUT,
};

export interface GameRunnerOptions {
  fixedStepMs?: number;
  /** Wall-clock time credited per tick is capped here after a stall. */
  maxElapsedMs?: number;
  /** Time left over once this many steps ran is dropped. */
  maxStepsPerTick?: number;
  now?: () => number;
}

/**
 * Drives a Game at a fixed step from wall-clock time. Input is sampled once
 * per step; nothing is stepped once the game has asked to quit.
 */
export class GameRunner {
  readonly stepMs: number;

  private accMs = 0;
  private readonly maxElapsedMs: number;
  private readonly maxStepsPerTick: number;
  private readonly now: () => number;

  constructor(
    private game: Game,
    private input: InputSource = NullInputSource,
    options: GameRunnerOptions = {},
  ) {
    this.stepMs = options.fixedStepMs ?? FIXED_STEP_MS;
    this.maxElapsedMs = options.maxElapsedMs ?? Infinity;
    this.maxStepsPerTick = options.maxStepsPerTick ?? Infinity;
    this.now = options.now ?? (() => performance.now());
  }

  get done(): boolean {
    return this.game.state.quitRequested;
  }

  /** Credits `elapsedMs` and runs the whole steps it pays for. */
  tick(elapsedMs: number): number {
    if (this.done) {
      this.accMs = 0;
      return 0;
    }

    this.accMs += Math.min(Math.max(0, elapsedMs), this.maxElapsedMs);
    let steps = 0;
    while (this.accMs >= this.stepMs && !this.done) {
      const frame = this.input.sample(this.game.state, this.stepMs);
      this.game.step(this.stepMs, frame);
      this.accMs -= this.stepMs;
      if (++steps >= this.maxStepsPerTick) {
        this.accMs = 0;
        break;
      }
    }
    if (this.done) this.accMs = 0;
    return steps;
  }

  /**
   * Ticks on an interval, calling `onFrame` after each tick. Resolves after
   * the frame on which the game asked to quit.
   */
  run(onFrame: (game: Game) => void): Promise<void> {
    return new Promise((resolve) => {
      let last = this.now();
      const loop = setInterval(() => {
        const now = this.now();
        this.tick(now - last);
        last = now;
        onFrame(this.game);
        if (this.done) {
          clearInterval(loop);
          resolve();
        }
      }, this.stepMs);
    });
  }
}
