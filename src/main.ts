import { DEFAULT_SETTINGS_PATH } from './core/constants';
import { Game } from './core/game';
import { FileHighScoreStore } from './core/highScore';
import { timeSeed } from './core/rng';
import { GameRunner } from './core/runner';
import { loadSettings } from './core/settings';
import { buildSnapshot } from './core/snapshot';
import { InputController } from './input/controller';
import { Keyboard } from './input/keyboard';
import { KeyboardInputSource } from './input/keyboardInputSource';
import { holdConsole } from './render/heldConsole';
import { renderText } from './render/textRenderer';

const CLEAR_SCREEN = '\x1b[2J';
const CURSOR_HOME = '\x1b[H';
const CLEAR_LINE = '\x1b[K';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

async function boot(): Promise<void> {
  const settings = loadSettings(
    process.env.STACKFALL_SETTINGS ?? DEFAULT_SETTINGS_PATH,
  );
  const highScoreStore = new FileHighScoreStore(
    process.env.STACKFALL_HIGH_SCORE ?? settings.highScore.path,
  );

  const game = new Game({
    seed: timeSeed(),
    ...settings.game,
    highScoreStore,
  });

  const controller = new InputController();
  const keyboard = new Keyboard(settings.input.bindings, (event) =>
    controller.dispatch(event),
  );
  const runner = new GameRunner(game, new KeyboardInputSource(controller), {
    maxElapsedMs: 250,
    maxStepsPerTick: 15,
  });

  const out = process.stdout;
  const color = out.isTTY === true;
  const draw = () => {
    const lines = renderText(buildSnapshot(game), { color });
    out.write(CURSOR_HOME + lines.map((l) => l + CLEAR_LINE).join('\n'));
  };

  const releaseConsole = holdConsole();
  out.write(HIDE_CURSOR + CLEAR_SCREEN);
  keyboard.attach(process.stdin);
  draw();

  try {
    await runner.run(draw);
  } finally {
    keyboard.dispose();
    out.write(`${SHOW_CURSOR}\n`);
    releaseConsole();
  }
}

boot().catch((e) => console.error(e));
