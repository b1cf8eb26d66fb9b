import { PIECES, type PieceKind } from './types';
import { XorShift32, shuffleInPlace } from './rng';
import type { PieceGenerator } from './generator';

/**
 * 7-bag randomizer: every aligned run of seven draws holds each kind once.
 */
export class Bag7 implements PieceGenerator {
  private rng: XorShift32;
  private queue: PieceKind[] = [];

  constructor(seed: number) {
    this.rng = new XorShift32(seed);
  }

  reset(seed: number): void {
    this.rng = new XorShift32(seed);
    this.queue = [];
  }

  next(): PieceKind {
    this.ensure(1);
    const k = this.queue.shift();
    if (k === undefined) throw new Error('Bag7 queue unexpectedly empty');
    return k;
  }

  peek(n: number): PieceKind[] {
    this.ensure(n);
    return this.queue.slice(0, n);
  }

  private ensure(n: number): void {
    while (this.queue.length < n) {
      const bag = [...PIECES];
      shuffleInPlace(bag, this.rng);
      this.queue.push(...bag);
    }
  }
}
