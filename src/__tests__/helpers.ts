import type { PieceGenerator } from '../core/generator';
import type { Board, InputFrame, PieceKind } from '../core/types';
import { EMPTY_INPUT } from '../core/types';

export class SequenceGenerator implements PieceGenerator {
  private i = 0;

  constructor(private kinds: PieceKind[]) {}

  next(): PieceKind {
    const k = this.kinds[this.i % this.kinds.length];
    this.i++;
    return k;
  }

  peek(n: number): PieceKind[] {
    return Array.from(
      { length: n },
      (_, j) => this.kinds[(this.i + j) % this.kinds.length],
    );
  }

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  reset(_seed: number): void {
    this.i = 0;
  }
}

export function frame(patch: Partial<InputFrame> = {}): InputFrame {
  return { ...EMPTY_INPUT, ...patch };
}

export function fillRow(
  board: Board,
  y: number,
  kind: PieceKind,
  gaps: number[] = [],
): void {
  board[y] = board[y].map((_, x) => (gaps.includes(x) ? null : kind));
}
