import { COLS, ROWS } from './constants';
import { cellsOf } from './tetromino';
import type { ActivePiece, Board, Vec2 } from './types';

export type LockFailure = 'above-top' | 'out-of-bounds' | 'occupied';

export type LockResult =
  | { ok: true; cells: Vec2[] }
  | { ok: false; reason: LockFailure };

export function makeBoard(): Board {
  return Array.from({ length: ROWS }, () => emptyRow());
}

function emptyRow(): Board[number] {
  return Array(COLS).fill(null);
}

export function inBounds(x: number, y: number): boolean {
  return x >= 0 && x < COLS && y >= 0 && y < ROWS;
}

/**
 * Rows above the visible top count as free so pieces can spawn there;
 * the side walls and the floor always count as occupied.
 */
export function isOccupied(board: Board, x: number, y: number): boolean {
  if (x < 0 || x >= COLS || y >= ROWS) return true;
  if (y < 0) return false;
  return board[y][x] != null;
}

export function validPosition(board: Board, piece: ActivePiece): boolean {
  return cellsOf(piece).every(([x, y]) => !isOccupied(board, x, y));
}

/**
 * Writes the piece into the board. Nothing is written when any cell is
 * above the top, outside the board or already filled.
 */
export function lockPiece(board: Board, piece: ActivePiece): LockResult {
  const cells = cellsOf(piece);
  for (const [x, y] of cells) {
    if (y < 0 && x >= 0 && x < COLS) return { ok: false, reason: 'above-top' };
    if (!inBounds(x, y)) return { ok: false, reason: 'out-of-bounds' };
    if (board[y][x] != null) return { ok: false, reason: 'occupied' };
  }
  for (const [x, y] of cells) board[y][x] = piece.k;
  return { ok: true, cells };
}

export function fullRows(board: Board): number[] {
  const rows: number[] = [];
  for (let y = 0; y < ROWS; y++) {
    if (board[y].every((c) => c != null)) rows.push(y);
  }
  return rows;
}

/**
 * Removes `rows` and lets everything above fall by the number of removed
 * rows beneath it, in one pass over the board.
 */
export function clearRows(board: Board, rows: readonly number[]): number {
  const drop = new Set(rows.filter((y) => y >= 0 && y < ROWS));
  if (drop.size === 0) return 0;

  const kept = board.filter((_, y) => !drop.has(y));
  const padding = Array.from({ length: drop.size }, () => emptyRow());
  board.splice(0, board.length, ...padding, ...kept);
  return drop.size;
}
