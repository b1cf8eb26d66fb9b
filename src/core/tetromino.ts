import type { ActivePiece, PieceKind, Rotation, Vec2 } from './types';

// Base cells inside a 4x4 box; rotation turns them about (1,1).
export const BASE_SHAPES: Readonly<Record<PieceKind, readonly Vec2[]>> = {
  I: [
    [0, 1],
    [1, 1],
    [2, 1],
    [3, 1],
  ],
  O: [
    [1, 1],
    [2, 1],
    [1, 2],
    [2, 2],
  ],
  T: [
    [1, 0],
    [0, 1],
    [1, 1],
    [2, 1],
  ],
  S: [
    [1, 1],
    [2, 1],
    [0, 2],
    [1, 2],
  ],
  Z: [
    [0, 1],
    [1, 1],
    [1, 2],
    [2, 2],
  ],
  J: [
    [0, 0],
    [0, 1],
    [1, 1],
    [2, 1],
  ],
  L: [
    [2, 0],
    [0, 1],
    [1, 1],
    [2, 1],
  ],
};

const PIVOT_X = 1;
const PIVOT_Y = 1;

function rotateCW([x, y]: Vec2): Vec2 {
  return [PIVOT_X + (y - PIVOT_Y), PIVOT_Y - (x - PIVOT_X)];
}

/**
 * Cell offsets of `kind` after `rotation` clockwise quarter turns,
 * derived from BASE_SHAPES on every call.
 */
export function rotatedCells(kind: PieceKind, rotation: Rotation): Vec2[] {
  let cells: Vec2[] = [...BASE_SHAPES[kind]];
  for (let i = 0; i < rotation; i++) cells = cells.map(rotateCW);
  return cells;
}

export function rotAdd(r: Rotation, dir: -1 | 1): Rotation {
  const next = (((r + dir) % 4) + 4) % 4;
  return toRotation(next);
}

function toRotation(n: number): Rotation {
  switch (n) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    default:
      return 0;
  }
}

export function cellsOf(piece: ActivePiece): Vec2[] {
  return rotatedCells(piece.k, piece.r).map(([x, y]): Vec2 => [
    piece.x + x,
    piece.y + y,
  ]);
}
