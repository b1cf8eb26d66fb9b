import type { InputSource } from '../core/runner';
import type { GameState, InputFrame } from '../core/types';
import type { InputController } from './controller';

export class KeyboardInputSource implements InputSource {
  constructor(private controller: InputController) {}

  sample(_state: GameState, _dtMs: number): InputFrame {
    return this.controller.sample();
  }
}
