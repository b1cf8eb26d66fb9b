import { emitKeypressEvents } from 'node:readline';
import { SOFT_DROP_RELEASE_MS } from '../core/constants';
import type { GameInputEvent } from '../core/types';
import type { KeyBindings } from './controller';

export interface Keypress {
  name?: string;
  ctrl?: boolean;
}

type Emit = (event: GameInputEvent) => void;

/**
 * Terminal keyboard. Terminals only report presses (plus auto-repeat), so a
 * soft drop counts as held until no repeat arrives for `releaseMs`.
 */
export class Keyboard {
  private stream: NodeJS.ReadStream | null = null;
  private softDropTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private bindings: KeyBindings,
    private emit: Emit,
    private releaseMs = SOFT_DROP_RELEASE_MS,
  ) {}

  attach(stream: NodeJS.ReadStream): void {
    emitKeypressEvents(stream);
    if (stream.isTTY) stream.setRawMode(true);
    stream.on('keypress', this.onKeypress);
    stream.resume();
    this.stream = stream;
  }

  dispose(): void {
    this.releaseSoftDrop();
    const stream = this.stream;
    if (!stream) return;
    stream.off('keypress', this.onKeypress);
    if (stream.isTTY) stream.setRawMode(false);
    stream.pause();
    this.stream = null;
  }

  handleKey(key: Keypress): void {
    const name = key.name;
    if (name == null) return;
    if (key.ctrl && name === 'c') {
      this.emit({ type: 'quit' });
      return;
    }

    const b = this.bindings;
    switch (name) {
      case b.moveLeft:
        this.emit({ type: 'move-left' });
        return;
      case b.moveRight:
        this.emit({ type: 'move-right' });
        return;
      case b.softDrop:
        this.pressSoftDrop();
        return;
      case b.hardDrop:
        this.emit({ type: 'hard-drop' });
        return;
      case b.rotateCW:
        this.emit({ type: 'rotate-cw' });
        return;
      case b.rotateCCW:
        this.emit({ type: 'rotate-ccw' });
        return;
      case b.hold:
        this.emit({ type: 'hold' });
        return;
      case b.pause:
        this.emit({ type: 'pause' });
        return;
      case b.start:
        this.emit({ type: 'start' });
        return;
      case b.quit:
        this.emit({ type: 'quit' });
        return;
    }
  }

  private onKeypress = (_str: string | undefined, key: Keypress | undefined) => {
    if (key) this.handleKey(key);
  };

  private pressSoftDrop(): void {
    if (this.softDropTimer == null) {
      this.emit({ type: 'soft-drop', held: true });
    } else {
      clearTimeout(this.softDropTimer);
    }
    this.softDropTimer = setTimeout(() => this.releaseSoftDrop(), this.releaseMs);
  }

  private releaseSoftDrop(): void {
    if (this.softDropTimer == null) return;
    clearTimeout(this.softDropTimer);
    this.softDropTimer = null;
    this.emit({ type: 'soft-drop', held: false });
  }
}
