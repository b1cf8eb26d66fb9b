import { readFileSync } from 'node:fs';
import {
  DEFAULT_GRAVITY_MS,
  DEFAULT_GRAVITY_STEP_MS,
  DEFAULT_HIGH_SCORE_PATH,
  DEFAULT_KEY_BINDINGS,
  DEFAULT_LOCK_DELAY_MS,
  DEFAULT_MIN_GRAVITY_MS,
  DEFAULT_SOFT_DROP_FACTOR,
  DEFAULT_SOFT_DROP_MAX_MS,
} from './constants';
import type { GameConfig } from './game';
import type { InputConfig } from '../input/controller';

export type GameSettings = Required<
  Pick<
    GameConfig,
    | 'gravityMs'
    | 'gravityStepMs'
    | 'minGravityMs'
    | 'softDropFactor'
    | 'softDropMaxMs'
    | 'lockDelayMs'
  >
>;

export interface HighScoreSettings {
  path: string;
}

export interface Settings {
  game: GameSettings;
  input: InputConfig;
  highScore: HighScoreSettings;
}

export const DEFAULT_SETTINGS: Settings = {
  game: {
    gravityMs: DEFAULT_GRAVITY_MS,
    gravityStepMs: DEFAULT_GRAVITY_STEP_MS,
    minGravityMs: DEFAULT_MIN_GRAVITY_MS,
    softDropFactor: DEFAULT_SOFT_DROP_FACTOR,
    softDropMaxMs: DEFAULT_SOFT_DROP_MAX_MS,
    lockDelayMs: DEFAULT_LOCK_DELAY_MS,
  },
  input: {
    bindings: DEFAULT_KEY_BINDINGS,
  },
  highScore: {
    path: DEFAULT_HIGH_SCORE_PATH,
  },
};

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function positive(v: unknown): number | undefined {
  const n = num(v);
  return n != null && n > 0 ? n : undefined;
}

function nonNegative(v: unknown): number | undefined {
  const n = num(v);
  return n != null && n >= 0 ? n : undefined;
}

function str(v: unknown): string | undefined {
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function mergeGame(base: GameSettings, patch: unknown): GameSettings {
  const p = isRecord(patch) ? patch : {};
  return {
    gravityMs: positive(p.gravityMs) ?? base.gravityMs,
    gravityStepMs: positive(p.gravityStepMs) ?? base.gravityStepMs,
    minGravityMs: positive(p.minGravityMs) ?? base.minGravityMs,
    softDropFactor: positive(p.softDropFactor) ?? base.softDropFactor,
    softDropMaxMs: positive(p.softDropMaxMs) ?? base.softDropMaxMs,
    lockDelayMs: nonNegative(p.lockDelayMs) ?? base.lockDelayMs,
  };
}

function mergeInput(base: InputConfig, patch: unknown): InputConfig {
  const p = isRecord(patch) && isRecord(patch.bindings) ? patch.bindings : {};
  const b = base.bindings;
  return {
    bindings: {
      moveLeft: str(p.moveLeft) ?? b.moveLeft,
      moveRight: str(p.moveRight) ?? b.moveRight,
      softDrop: str(p.softDrop) ?? b.softDrop,
      hardDrop: str(p.hardDrop) ?? b.hardDrop,
      rotateCW: str(p.rotateCW) ?? b.rotateCW,
      rotateCCW: str(p.rotateCCW) ?? b.rotateCCW,
      hold: str(p.hold) ?? b.hold,
      pause: str(p.pause) ?? b.pause,
      start: str(p.start) ?? b.start,
      quit: str(p.quit) ?? b.quit,
    },
  };
}

function mergeHighScore(
  base: HighScoreSettings,
  patch: unknown,
): HighScoreSettings {
  const p = isRecord(patch) ? patch : {};
  return {
    path: str(p.path) ?? base.path,
  };
}

/** Applies a parsed JSON patch; fields that fail validation keep `base`. */
export function mergeSettings(base: Settings, patch: unknown): Settings {
  const p = isRecord(patch) ? patch : {};
  return {
    game: mergeGame(base.game, p.game),
    input: mergeInput(base.input, p.input),
    highScore: mergeHighScore(base.highScore, p.highScore),
  };
}

export function loadSettings(path: string): Settings {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch {
    // A missing file just means "use defaults".
    return DEFAULT_SETTINGS;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return mergeSettings(DEFAULT_SETTINGS, parsed);
  } catch (err) {
    console.warn(`[Settings] Ignoring malformed ${path}:`, err);
    return DEFAULT_SETTINGS;
  }
}
