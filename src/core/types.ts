export const PIECES = ['I', 'O', 'T', 'S', 'Z', 'J', 'L'] as const;
export type PieceKind = (typeof PIECES)[number];

export type Rotation = 0 | 1 | 2 | 3;
export type Vec2 = readonly [number, number];

export type Cell = PieceKind | null;
export type Board = Cell[][];

export interface ActivePiece {
  k: PieceKind;
  r: Rotation;
  x: number;
  y: number; // can be negative while spawning
}

export type GamePhase = 'start-menu' | 'playing' | 'paused' | 'game-over';

export interface HoldState {
  held: PieceKind | null;
  usedThisSpawn: boolean;
}

export interface ScoreState {
  score: number;
  level: number;
  lines: number;
}

export interface GameState {
  phase: GamePhase;
  board: Board;
  active: ActivePiece | null; // null while cleared rows are pending
  ghostY: number | null;
  hold: HoldState;
  next: PieceKind[]; // preview window (derived from generator)
  stats: ScoreState;
  highScore: number;
  pendingRows: number[];
  quitRequested: boolean;
}

export const INPUT_EVENT_TYPES = [
  'move-left',
  'move-right',
  'soft-drop',
  'rotate-cw',
  'rotate-ccw',
  'hard-drop',
  'hold',
  'pause',
  'start',
  'quit',
] as const;
export type InputEventType = (typeof INPUT_EVENT_TYPES)[number];

export type GameInputEvent =
  | { type: 'soft-drop'; held: boolean }
  | { type: Exclude<InputEventType, 'soft-drop'> };

export type RotateDir = -1 | 1; // -1 = CCW, +1 = CW

export interface InputFrame {
  quit: boolean;
  start: boolean;
  pause: boolean;
  hold: boolean;
  /** Rotation presses in arrival order; each is attempted once. */
  rotations: readonly RotateDir[];
  /**
   * Signed number of horizontal steps to attempt this frame.
   */
  moveX: number;
  softDrop: boolean;
  hardDrop: boolean;
}

export const EMPTY_INPUT: InputFrame = {
  quit: false,
  start: false,
  pause: false,
  hold: false,
  rotations: [],
  moveX: 0,
  softDrop: false,
  hardDrop: false,
};
