export interface RandomSource {
  nextInt(maxExclusive: number): number;
}

export class XorShift32 implements RandomSource {
  private s: number;

  constructor(seed: number) {
    // avoid zero state
    this.s = seed | 0 || 0x12345678;
  }

  nextU32(): number {
    let x = this.s | 0;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x | 0;
    return this.s >>> 0;
  }

  nextInt(maxExclusive: number): number {
    return this.nextU32() % maxExclusive;
  }
}

/** Fisher-Yates. */
export function shuffleInPlace<T>(arr: T[], rng: RandomSource): void {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

export function timeSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x7fffffff)) >>> 0;
}
