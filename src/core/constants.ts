export const COLS = 10;
export const ROWS = 20;
export const NEXT_COUNT = 5;

export const SPAWN_X = Math.floor(COLS / 2) - 2;
export const SPAWN_Y = -2;

// Horizontal offsets tried, in order, when a rotation is blocked.
export const KICK_OFFSETS = [0, 1, -1, 2, -2] as const;

export const FIXED_STEP_MS = 1000 / 60;

export const DEFAULT_GRAVITY_MS = 800;
export const DEFAULT_GRAVITY_STEP_MS = 70;
export const DEFAULT_MIN_GRAVITY_MS = 50;
export const DEFAULT_SOFT_DROP_FACTOR = 0.25;
export const DEFAULT_SOFT_DROP_MAX_MS = 20;
export const DEFAULT_LOCK_DELAY_MS = 500;

export const LINE_CLEAR_FLASH_MS = 350;
export const LEVEL_UP_POPUP_MS = 1200;

export const LINES_PER_LEVEL = 10;
export const LINE_CLEAR_POINTS = [0, 40, 100, 300, 1200] as const;
export const SOFT_DROP_POINTS_PER_CELL = 1;
export const HARD_DROP_POINTS_PER_CELL = 2;

export const DEFAULT_KEY_BINDINGS = {
  moveLeft: 'left',
  moveRight: 'right',
  softDrop: 'down',
  hardDrop: 'space',
  rotateCW: 'x',
  rotateCCW: 'z',
  hold: 'c',
  pause: 'p',
  start: 'return',
  quit: 'escape',
};

export const DEFAULT_SETTINGS_PATH = 'stackfall.settings.json';
export const DEFAULT_HIGH_SCORE_PATH = 'stackfall_highscore.txt';

// Terminals report key presses but not releases.
export const SOFT_DROP_RELEASE_MS = 120;
