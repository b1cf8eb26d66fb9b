import type { PieceKind } from './types';

export type PiecePalette = Record<PieceKind, number>;

export const PIECE_COLORS: PiecePalette = {
  I: 0x00ffff,
  O: 0xffff00,
  T: 0xa000f0,
  S: 0x00f000,
  Z: 0xf00000,
  J: 0x0000f0,
  L: 0xf0a000,
};

export const GHOST_COLOR = 0x969696;

export function colorOf(kind: PieceKind): number {
  return PIECE_COLORS[kind];
}
