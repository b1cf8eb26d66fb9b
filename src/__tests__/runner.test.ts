import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Game } from '../core/game';
import { GameRunner, type InputSource } from '../core/runner';
import { EMPTY_INPUT, type GameState, type InputFrame } from '../core/types';
import { SequenceGenerator } from './helpers';

class CountingInput implements InputSource {
  count = 0;

  constructor(private frame: InputFrame = EMPTY_INPUT) {}

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  sample(_state: GameState, _dtMs: number): InputFrame {
    this.count++;
    return this.frame;
  }
}

function makeGame(): Game {
  return new Game({
    seed: 1,
    generatorFactory: () => new SequenceGenerator(['T']),
  });
}

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('GameRunner.tick', () => {
  it('caps steps per tick', () => {
    const input = new CountingInput();
    const runner = new GameRunner(makeGame(), input, {
      fixedStepMs: 16,
      maxStepsPerTick: 2,
    });

    expect(runner.tick(1000)).toBe(2);
    expect(input.count).toBe(2);
    expect(runner.tick(0)).toBe(0);
  });

  it('carries leftover time into the next tick', () => {
    const input = new CountingInput();
    const runner = new GameRunner(makeGame(), input, { fixedStepMs: 10 });

    expect(runner.tick(25)).toBe(2);
    expect(runner.tick(5)).toBe(1);
    expect(input.count).toBe(3);
  });

  it('clamps long stalls', () => {
    const input = new CountingInput();
    const runner = new GameRunner(makeGame(), input, {
      fixedStepMs: 10,
      maxElapsedMs: 50,
    });

    expect(runner.tick(10_000)).toBe(5);
  });

  it('ignores negative elapsed time', () => {
    const runner = new GameRunner(makeGame(), new CountingInput(), {
      fixedStepMs: 10,
    });

    expect(runner.tick(-100)).toBe(0);
    expect(runner.tick(10)).toBe(1);
  });

  it('stops stepping once quit is requested', () => {
    const game = makeGame();
    const input = new CountingInput({ ...EMPTY_INPUT, quit: true });
    const runner = new GameRunner(game, input, { fixedStepMs: 10 });

    expect(runner.tick(100)).toBe(1);
    expect(runner.done).toBe(true);
    expect(runner.tick(100)).toBe(0);
    expect(input.count).toBe(1);
  });

  it('defaults to the 60 Hz step and drives gravity', () => {
    const game = makeGame();
    const start = new CountingInput({ ...EMPTY_INPUT, start: true });
    new GameRunner(game, start).tick(1000 / 60);
    expect(game.state.phase).toBe('playing');

    const runner = new GameRunner(game);
    expect(runner.stepMs).toBeCloseTo(16.667, 3);
    runner.tick(850);
    expect(game.state.active?.y).toBe(-1);
  });
});

describe('GameRunner.run', () => {
  it('ticks on an interval and resolves after the quitting frame', async () => {
    vi.useFakeTimers();
    let clock = 0;
    const game = makeGame();
    const frames: number[] = [];
    let frameIndex = 0;
    const input: InputSource = {
      sample: () => {
        frameIndex++;
        return frameIndex === 3 ? { ...EMPTY_INPUT, quit: true } : EMPTY_INPUT;
      },
    };
    const runner = new GameRunner(game, input, {
      fixedStepMs: 10,
      now: () => clock,
    });

    let resolved = false;
    const done = runner.run(() => frames.push(clock)).then(() => {
      resolved = true;
    });

    for (let i = 0; i < 5; i++) {
      clock += 10;
      await vi.advanceTimersByTimeAsync(10);
    }
    await done;

    expect(resolved).toBe(true);
    expect(frames).toEqual([10, 20, 30]);
    expect(game.state.quitRequested).toBe(true);
  });
});
