import { existsSync, readFileSync, writeFileSync } from 'node:fs';

export interface HighScoreStore {
  load(): number | null;
  save(score: number): void;
}

function parseScore(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') return 0;
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/** Keeps the best score as a bare integer in a text file. */
export class FileHighScoreStore implements HighScoreStore {
  constructor(private readonly path: string) {}

  load(): number | null {
    try {
      if (!existsSync(this.path)) return null;
      const score = parseScore(readFileSync(this.path, 'utf8'));
      if (score == null) {
        console.warn(`[HighScore] Ignoring malformed file ${this.path}.`);
      }
      return score;
    } catch (err) {
      console.warn(`[HighScore] Failed to read ${this.path}:`, err);
      return null;
    }
  }

  save(score: number): void {
    try {
      writeFileSync(this.path, String(Math.trunc(score)), 'utf8');
    } catch (err) {
      console.warn(`[HighScore] Failed to write ${this.path}:`, err);
    }
  }
}

export class MemoryHighScoreStore implements HighScoreStore {
  saves: number[] = [];

  constructor(private value: number | null = null) {}

  load(): number | null {
    return this.value;
  }

  save(score: number): void {
    this.value = score;
    this.saves.push(score);
  }
}
