import { COLS, ROWS } from '../core/constants';
import { GHOST_COLOR } from '../core/palette';
import type { GameSnapshot } from '../core/snapshot';

export interface TextRenderOptions {
  color?: boolean;
}

const BLOCK = '[]';
const GHOST = '::';
const FLASH = '##';
const EMPTY = ' .';

const RESET = '\x1b[0m';

function fg(color: number): string {
  const r = (color >> 16) & 0xff;
  const g = (color >> 8) & 0xff;
  const b = color & 0xff;
  return `\x1b[38;2;${r};${g};${b}m`;
}

function paint(text: string, color: number, enabled: boolean): string {
  return enabled ? `${fg(color)}${text}${RESET}` : text;
}

function overlayText(s: GameSnapshot): string {
  switch (s.phase) {
    case 'start-menu':
      return 'Press Enter to start';
    case 'paused':
      return 'PAUSED';
    case 'game-over':
      return `GAME OVER  Score ${s.score}  Enter: menu`;
    case 'playing':
      return s.levelUp ? `Level up! Level ${s.levelUp.level}` : '';
  }
}

/**
 * Draws a snapshot as plain text lines: the well on the left, stats on
 * the right, and a status line underneath.
 */
export function renderText(
  s: GameSnapshot,
  options: TextRenderOptions = {},
): string[] {
  const color = options.color ?? false;
  const cells: string[][] = s.board.map((row) =>
    row.map((c) => (c == null ? EMPTY : paint(BLOCK, c, color))),
  );

  const put = (x: number, y: number, text: string) => {
    if (y >= 0 && y < ROWS && x >= 0 && x < COLS) cells[y][x] = text;
  };

  for (const [x, y] of s.ghost) put(x, y, paint(GHOST, GHOST_COLOR, color));
  if (s.active) {
    for (const [x, y] of s.active.cells) {
      put(x, y, paint(BLOCK, s.active.color, color));
    }
  }
  if (s.lineClear) {
    for (const y of s.lineClear.rows) {
      for (let x = 0; x < COLS; x++) put(x, y, FLASH);
    }
  }

  const panel = [
    `SCORE ${s.score}`,
    `LEVEL ${s.level}`,
    `LINES ${s.lines}`,
    `HIGH  ${s.highScore}`,
    '',
    `HOLD  ${s.hold ?? '-'}${s.canHold ? '' : ' (used)'}`,
    `NEXT  ${s.next.join(' ')}`,
  ];

  const lines = cells.map((row, y) => {
    const side = panel[y];
    return side ? `<!${row.join('')}!>  ${side}` : `<!${row.join('')}!>`;
  });
  lines.push(`<!${'='.repeat(COLS * 2)}!>`);
  lines.push(overlayText(s));
  return lines;
}
