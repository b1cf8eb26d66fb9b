import {
  DEFAULT_LOCK_DELAY_MS,
  HARD_DROP_POINTS_PER_CELL,
  LEVEL_UP_POPUP_MS,
  LINE_CLEAR_FLASH_MS,
  NEXT_COUNT,
  SOFT_DROP_POINTS_PER_CELL,
} from './constants';
import {
  clearRows,
  fullRows,
  lockPiece,
  makeBoard,
  validPosition,
} from './board';
import { Bag7 } from './bag7';
import type { PieceGenerator } from './generator';
import type { HighScoreStore } from './highScore';
import { HoldSlot } from './hold';
import {
  dropDistance,
  isGrounded,
  spawnPiece,
  tryMove,
  tryRotate,
} from './piece';
import { XorShift32 } from './rng';
import {
  DEFAULT_GRAVITY_TIMING,
  DEFAULT_SOFT_DROP_TIMING,
  ScoreTracker,
  gravityIntervalMs,
  softDropIntervalMs,
  type GravityTiming,
  type SoftDropTiming,
} from './scoring';
import { Timer } from './timer';
import type {
  GamePhase,
  GameState,
  InputFrame,
  PieceKind,
  RotateDir,
} from './types';

export interface GameConfig {
  seed: number;
  gravityMs?: number;
  gravityStepMs?: number;
  minGravityMs?: number;
  softDropFactor?: number;
  softDropMaxMs?: number;
  lockDelayMs?: number;
  generatorFactory?: (seed: number) => PieceGenerator;
  highScoreStore?: HighScoreStore;
}

export interface GameTimers {
  gravity: Timer;
  lockDelay: Timer;
  lineClearFlash: Timer;
  levelUp: Timer;
}

export class Game {
  readonly state: GameState;
  readonly timers: GameTimers;

  private generator: PieceGenerator;
  private seeds: XorShift32;
  private holdSlot = new HoldSlot();
  private scoring = new ScoreTracker();
  private gravityTiming: GravityTiming;
  private softDropTiming: SoftDropTiming;
  private highScoreStore?: HighScoreStore;

  constructor(cfg: GameConfig) {
    this.seeds = new XorShift32(cfg.seed);
    this.gravityTiming = {
      gravityMs: cfg.gravityMs ?? DEFAULT_GRAVITY_TIMING.gravityMs,
      gravityStepMs: cfg.gravityStepMs ?? DEFAULT_GRAVITY_TIMING.gravityStepMs,
      minGravityMs: cfg.minGravityMs ?? DEFAULT_GRAVITY_TIMING.minGravityMs,
    };
    this.softDropTiming = {
      softDropFactor:
        cfg.softDropFactor ?? DEFAULT_SOFT_DROP_TIMING.softDropFactor,
      softDropMaxMs: cfg.softDropMaxMs ?? DEFAULT_SOFT_DROP_TIMING.softDropMaxMs,
    };
    this.highScoreStore = cfg.highScoreStore;

    const makeGenerator = cfg.generatorFactory ?? ((seed) => new Bag7(seed));
    this.generator = makeGenerator(cfg.seed);

    this.timers = {
      gravity: new Timer(gravityIntervalMs(0, this.gravityTiming)),
      lockDelay: new Timer(cfg.lockDelayMs ?? DEFAULT_LOCK_DELAY_MS),
      lineClearFlash: new Timer(LINE_CLEAR_FLASH_MS),
      levelUp: new Timer(LEVEL_UP_POPUP_MS),
    };

    this.state = {
      phase: 'start-menu',
      board: makeBoard(),
      active: null,
      ghostY: null,
      hold: this.holdSlot.state,
      next: this.generator.peek(NEXT_COUNT),
      stats: this.scoring.state,
      highScore: this.loadHighScore(),
      pendingRows: [],
      quitRequested: false,
    };
  }

  step(dtMs: number, input: InputFrame): void {
    if (input.quit) {
      this.quit();
      return;
    }

    switch (this.state.phase) {
      case 'start-menu':
        if (input.start) this.start();
        return;
      case 'game-over':
        if (input.start) {
          this.reset();
          this.setPhase('start-menu');
        }
        return;
      case 'paused':
        if (input.pause) this.setPhase('playing');
        return;
      case 'playing':
        if (input.pause) {
          this.setPhase('paused');
          return;
        }
        this.stepPlaying(dtMs, input);
        return;
    }
  }

  /** Full reset: empty board, zero score, fresh bag, empty hold. */
  private reset(seed: number = this.seeds.nextU32()): void {
    this.generator.reset(seed);
    this.holdSlot.reset();
    this.scoring.reset();

    this.state.board = makeBoard();
    this.state.active = null;
    this.state.ghostY = null;
    this.state.pendingRows = [];
    this.state.quitRequested = false;

    this.timers.gravity.stop();
    this.timers.lockDelay.stop();
    this.timers.lineClearFlash.stop();
    this.timers.levelUp.stop();

    this.updateNextView();
  }

  private start(): void {
    this.setPhase('playing');
    this.spawnNext();
  }

  private quit(): void {
    if (this.state.quitRequested) return;
    this.state.quitRequested = true;
    console.info('[Game] Quit requested.');
    this.commitHighScore();
  }

  private stepPlaying(dtMs: number, input: InputFrame): void {
    this.advanceLevelUp(dtMs);

    if (this.timers.lineClearFlash.running) {
      this.advanceLineClear(dtMs);
      return;
    }

    if (this.applyInput(input)) return;
    this.applyGravity(dtMs, input.softDrop);
    this.applyLock(dtMs);
  }

  /** Returns true when the piece was replaced or locked and the step is over. */
  private applyInput(input: InputFrame): boolean {
    if (input.hold) this.doHold();
    if (this.state.phase !== 'playing') return true;
    for (const dir of input.rotations) this.doRotate(dir);
    if (input.moveX !== 0) this.doMoveSteps(input.moveX);
    if (input.hardDrop) {
      this.doHardDrop();
      return true;
    }
    return false;
  }

  private applyGravity(dtMs: number, softDrop: boolean): void {
    const base = gravityIntervalMs(this.state.stats.level, this.gravityTiming);
    const interval = softDrop
      ? softDropIntervalMs(base, this.softDropTiming)
      : base;

    const gravity = this.timers.gravity;
    gravity.retarget(interval);
    gravity.advance(dtMs);

    while (gravity.expired) {
      gravity.consume();
      if (!this.tryMoveDown()) {
        // grounded: stop consuming extra gravity this tick
        gravity.reset();
        break;
      }
      if (softDrop) this.scoring.addDropBonus(SOFT_DROP_POINTS_PER_CELL);
    }
  }

  private applyLock(dtMs: number): void {
    const piece = this.state.active;
    if (!piece) return;

    const lockDelay = this.timers.lockDelay;
    if (!isGrounded(this.state.board, piece)) {
      lockDelay.stop();
      return;
    }

    if (!lockDelay.running) lockDelay.start();
    lockDelay.advance(dtMs);
    if (lockDelay.expired) this.lockActive();
  }

  private advanceLineClear(dtMs: number): void {
    const flash = this.timers.lineClearFlash;
    flash.advance(dtMs);
    if (!flash.expired) return;

    flash.stop();
    const rows = this.state.pendingRows;
    this.state.pendingRows = [];
    const cleared = clearRows(this.state.board, rows);
    const { leveledUp } = this.scoring.onLinesCleared(cleared);
    if (leveledUp) {
      this.timers.levelUp.start();
      console.info(`[Game] Level ${this.state.stats.level}.`);
    }
    this.spawnNext();
  }

  private advanceLevelUp(dtMs: number): void {
    const popup = this.timers.levelUp;
    popup.advance(dtMs);
    if (popup.expired) popup.stop();
  }

  private doMoveSteps(move: number): void {
    const piece = this.state.active;
    if (!piece) return;

    const dir = move < 0 ? -1 : 1;
    const steps = Math.abs(Math.trunc(move));
    let moved = false;
    for (let i = 0; i < steps; i++) {
      if (!tryMove(this.state.board, piece, dir, 0)) break;
      moved = true;
    }
    if (moved) this.onShifted();
  }

  private doRotate(dir: RotateDir): void {
    const piece = this.state.active;
    if (piece && tryRotate(this.state.board, piece, dir)) this.onShifted();
  }

  /** A grounded piece that moves or rotates gets a fresh lock delay. */
  private onShifted(): void {
    if (this.timers.lockDelay.running) this.timers.lockDelay.reset();
    this.recomputeGhost();
  }

  private tryMoveDown(): boolean {
    const piece = this.state.active;
    return piece != null && tryMove(this.state.board, piece, 0, 1);
  }

  private doHardDrop(): void {
    const piece = this.state.active;
    if (!piece) return;

    const d = dropDistance(this.state.board, piece);
    piece.y += d;
    this.scoring.addDropBonus(HARD_DROP_POINTS_PER_CELL * d);
    this.lockActive();
  }

  private doHold(): void {
    const piece = this.state.active;
    if (!piece) return;

    const { consumed, nextKind } = this.holdSlot.hold(piece.k);
    if (!consumed) return;

    if (nextKind == null) {
      const k = this.generator.next();
      this.updateNextView();
      this.spawnActive(k);
    } else {
      this.spawnActive(nextKind);
    }
  }

  private lockActive(): void {
    const piece = this.state.active;
    if (!piece) return;

    const result = lockPiece(this.state.board, piece);
    this.timers.lockDelay.stop();
    this.timers.gravity.reset();

    if (!result.ok) {
      this.endGame(`lock failed: ${result.reason}`);
      return;
    }

    const rows = fullRows(this.state.board);
    if (rows.length > 0) {
      this.state.pendingRows = rows;
      this.state.active = null;
      this.state.ghostY = null;
      this.timers.lineClearFlash.start();
      return;
    }

    this.spawnNext();
  }

  private spawnNext(): void {
    const k = this.generator.next();
    this.updateNextView();
    this.holdSlot.onSpawn();
    this.spawnActive(k);
  }

  private spawnActive(k: PieceKind): void {
    const piece = spawnPiece(k);
    this.state.active = piece;
    this.timers.gravity.start();
    this.timers.lockDelay.stop();

    if (!validPosition(this.state.board, piece)) {
      this.state.ghostY = piece.y;
      this.endGame('spawn blocked');
      return;
    }
    this.recomputeGhost();
  }

  private endGame(reason: string): void {
    console.info(`[Game] Game over (${reason}).`);
    this.setPhase('game-over');
    this.commitHighScore();
  }

  private setPhase(phase: GamePhase): void {
    if (this.state.phase === phase) return;
    console.info(`[Game] ${this.state.phase} -> ${phase}`);
    this.state.phase = phase;
  }

  private updateNextView(): void {
    this.state.next = this.generator.peek(NEXT_COUNT);
  }

  private recomputeGhost(): void {
    const piece = this.state.active;
    this.state.ghostY = piece
      ? piece.y + dropDistance(this.state.board, piece)
      : null;
  }

  private loadHighScore(): number {
    try {
      const stored = this.highScoreStore?.load() ?? null;
      return stored != null && stored > 0 ? stored : 0;
    } catch (err) {
      console.warn('[HighScore] Load failed; starting from 0.', err);
      return 0;
    }
  }

  private commitHighScore(): void {
    const score = this.state.stats.score;
    if (score <= this.state.highScore) return;

    this.state.highScore = score;
    console.info(`[HighScore] New high score ${score}.`);
    try {
      this.highScoreStore?.save(score);
    } catch (err) {
      console.warn('[HighScore] Save failed.', err);
    }
  }
}
