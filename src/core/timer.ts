/**
 * Elapsed-time counter advanced by the game step. A stopped timer ignores
 * `advance`; `expired` is only ever true while running.
 */
export class Timer {
  private elapsed = 0;
  private active = false;

  constructor(private duration: number) {}

  get durationMs(): number {
    return this.duration;
  }

  get elapsedMs(): number {
    return this.elapsed;
  }

  get remainingMs(): number {
    return this.active ? Math.max(0, this.duration - this.elapsed) : 0;
  }

  get running(): boolean {
    return this.active;
  }

  get expired(): boolean {
    return this.active && this.elapsed >= this.duration;
  }

  start(): void {
    this.active = true;
    this.elapsed = 0;
  }

  stop(): void {
    this.active = false;
    this.elapsed = 0;
  }

  reset(): void {
    this.elapsed = 0;
  }

  advance(dtMs: number): void {
    if (this.active && dtMs > 0) this.elapsed += dtMs;
  }

  /** Removes one full period, keeping the overshoot. */
  consume(): void {
    this.elapsed = Math.max(0, this.elapsed - this.duration);
  }

  /**
   * Changes the period. The fraction already elapsed carries over so a
   * shorter period does not fire retroactively.
   */
  retarget(durationMs: number): void {
    if (durationMs === this.duration) return;

    if (this.duration <= 0 || durationMs <= 0) {
      this.elapsed = 0;
      this.duration = durationMs;
      return;
    }

    const phase = this.elapsed / this.duration;
    this.elapsed = Math.min(phase * durationMs, durationMs);
    this.duration = durationMs;
  }
}
