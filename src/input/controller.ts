import {
  EMPTY_INPUT,
  INPUT_EVENT_TYPES,
  type GameInputEvent,
  type InputFrame,
  type RotateDir,
} from '../core/types';

export interface KeyBindings {
  moveLeft: string;
  moveRight: string;
  softDrop: string;
  hardDrop: string;
  rotateCW: string;
  rotateCCW: string;
  hold: string;
  pause: string;
  start: string;
  quit: string;
}

export interface InputConfig {
  bindings: KeyBindings;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

export function isGameInputEvent(value: unknown): value is GameInputEvent {
  if (!isRecord(value)) return false;
  const type = value.type;
  if (typeof type !== 'string') return false;
  if (!(INPUT_EVENT_TYPES as readonly string[]).includes(type)) return false;
  return type !== 'soft-drop' || typeof value.held === 'boolean';
}

/**
 * Queues discrete input events between steps and collapses them into one
 * InputFrame per step. Moves sum, rotations keep their order, and soft drop
 * is a held state that carries over.
 */
export class InputController {
  private pending: GameInputEvent[] = [];
  private softDropHeld = false;

  /** Unrecognised events are dropped. Returns whether it was queued. */
  dispatch(event: unknown): boolean {
    if (!isGameInputEvent(event)) return false;
    this.pending.push(event);
    return true;
  }

  sample(): InputFrame {
    const events = this.pending;
    this.pending = [];
    if (events.length === 0) {
      return { ...EMPTY_INPUT, softDrop: this.softDropHeld };
    }

    let quit = false;
    let start = false;
    let pauseToggles = 0;
    let hold = false;
    const rotations: RotateDir[] = [];
    let moveX = 0;
    let hardDrop = false;

    for (const event of events) {
      switch (event.type) {
        case 'quit':
          quit = true;
          break;
        case 'start':
          start = true;
          break;
        case 'pause':
          pauseToggles++;
          break;
        case 'hold':
          hold = true;
          break;
        case 'rotate-cw':
          rotations.push(1);
          break;
        case 'rotate-ccw':
          rotations.push(-1);
          break;
        case 'move-left':
          moveX--;
          break;
        case 'move-right':
          moveX++;
          break;
        case 'soft-drop':
          this.softDropHeld = event.held;
          break;
        case 'hard-drop':
          hardDrop = true;
          break;
      }
    }

    return {
      quit,
      start,
      pause: pauseToggles % 2 === 1,
      hold,
      rotations,
      moveX,
      softDrop: this.softDropHeld,
      hardDrop,
    };
  }
}
