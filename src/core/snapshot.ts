import { colorOf } from './palette';
import { cellsOf } from './tetromino';
import type { Game } from './game';
import type { GamePhase, PieceKind, Vec2 } from './types';

export interface ActiveView {
  kind: PieceKind;
  color: number;
  cells: Vec2[];
}

/** Read-only view of one step, handed to whatever draws the game. */
export interface GameSnapshot {
  phase: GamePhase;
  board: (number | null)[][];
  active: ActiveView | null;
  ghost: Vec2[];
  hold: PieceKind | null;
  canHold: boolean;
  next: PieceKind[];
  score: number;
  level: number;
  lines: number;
  highScore: number;
  lineClear: { rows: number[]; remainingMs: number } | null;
  levelUp: { level: number; remainingMs: number } | null;
}

export function buildSnapshot(game: Game): GameSnapshot {
  const { state, timers } = game;
  const active = state.active;

  return {
    phase: state.phase,
    board: state.board.map((row) =>
      row.map((cell) => (cell == null ? null : colorOf(cell))),
    ),
    active: active
      ? { kind: active.k, color: colorOf(active.k), cells: cellsOf(active) }
      : null,
    ghost:
      active && state.ghostY != null
        ? cellsOf({ ...active, y: state.ghostY })
        : [],
    hold: state.hold.held,
    canHold: !state.hold.usedThisSpawn,
    next: [...state.next],
    score: state.stats.score,
    level: state.stats.level,
    lines: state.stats.lines,
    highScore: Math.max(state.highScore, state.stats.score),
    lineClear: timers.lineClearFlash.running
      ? {
          rows: [...state.pendingRows],
          remainingMs: timers.lineClearFlash.remainingMs,
        }
      : null,
    levelUp: timers.levelUp.running
      ? { level: state.stats.level, remainingMs: timers.levelUp.remainingMs }
      : null,
  };
}
