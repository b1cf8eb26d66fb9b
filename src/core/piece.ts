import { KICK_OFFSETS, SPAWN_X, SPAWN_Y } from './constants';
import { rotAdd } from './tetromino';
import { validPosition } from './board';
import type { ActivePiece, Board, PieceKind } from './types';

export { cellsOf } from './tetromino';

export function spawnPiece(k: PieceKind): ActivePiece {
  return { k, r: 0, x: SPAWN_X, y: SPAWN_Y };
}

export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): boolean {
  const candidate: ActivePiece = { ...piece, x: piece.x + dx, y: piece.y + dy };
  if (!validPosition(board, candidate)) return false;
  piece.x = candidate.x;
  piece.y = candidate.y;
  return true;
}

/**
 * Rotates one quarter turn, trying the in-place rotation first and then
 * each horizontal kick in KICK_OFFSETS order on the same row.
 */
export function tryRotate(
  board: Board,
  piece: ActivePiece,
  dir: -1 | 1,
): boolean {
  const to = rotAdd(piece.r, dir);

  for (const dx of KICK_OFFSETS) {
    const candidate: ActivePiece = { ...piece, r: to, x: piece.x + dx };
    if (validPosition(board, candidate)) {
      piece.r = candidate.r;
      piece.x = candidate.x;
      return true;
    }
  }
  return false;
}

export function dropDistance(board: Board, piece: ActivePiece): number {
  const probe: ActivePiece = { ...piece };
  let d = 0;
  while (tryMove(board, probe, 0, 1)) d++;
  return d;
}

export function ghostOf(board: Board, piece: ActivePiece): ActivePiece {
  return { ...piece, y: piece.y + dropDistance(board, piece) };
}

export function isGrounded(board: Board, piece: ActivePiece): boolean {
  return !validPosition(board, { ...piece, y: piece.y + 1 });
}
