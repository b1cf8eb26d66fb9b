import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SETTINGS, loadSettings, mergeSettings } from '../core/settings';

describe('mergeSettings', () => {
  it('applies valid fields and keeps the rest', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, {
      game: { gravityMs: 600, lockDelayMs: 'soon' },
      input: { bindings: { hold: 'h', pause: 3 } },
      highScore: { path: '/tmp/best.txt' },
    });

    expect(merged.game).toEqual({ ...DEFAULT_SETTINGS.game, gravityMs: 600 });
    expect(merged.input.bindings.hold).toBe('h');
    expect(merged.input.bindings.pause).toBe('p');
    expect(merged.highScore.path).toBe('/tmp/best.txt');
  });

  it('rejects non-positive intervals', () => {
    const merged = mergeSettings(DEFAULT_SETTINGS, {
      game: { gravityMs: 0, minGravityMs: -5, softDropMaxMs: Infinity },
    });
    expect(merged.game).toEqual(DEFAULT_SETTINGS.game);
  });

  it('requires a positive gravity step and a non-negative lock delay', () => {
    const rejected = mergeSettings(DEFAULT_SETTINGS, {
      game: { gravityStepMs: 0, lockDelayMs: -1 },
    });
    expect(rejected.game).toEqual(DEFAULT_SETTINGS.game);

    const accepted = mergeSettings(DEFAULT_SETTINGS, {
      game: { gravityStepMs: 35, lockDelayMs: 0 },
    });
    expect(accepted.game.gravityStepMs).toBe(35);
    expect(accepted.game.lockDelayMs).toBe(0);
  });

  it('treats a non-object patch as empty', () => {
    expect(mergeSettings(DEFAULT_SETTINGS, [1, 2])).toEqual(DEFAULT_SETTINGS);
    expect(mergeSettings(DEFAULT_SETTINGS, null)).toEqual(DEFAULT_SETTINGS);
  });
});

describe('loadSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stackfall-settings-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('falls back to defaults when the file is missing', () => {
    expect(loadSettings(join(dir, 'none.json'))).toBe(DEFAULT_SETTINGS);
  });

  it('falls back to defaults on malformed JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = join(dir, 'bad.json');
    writeFileSync(path, '{ nope');
    expect(loadSettings(path)).toBe(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('merges a partial file over the defaults', () => {
    const path = join(dir, 'ok.json');
    writeFileSync(path, JSON.stringify({ game: { lockDelayMs: 250 } }));
    const settings = loadSettings(path);
    expect(settings.game.lockDelayMs).toBe(250);
    expect(settings.game.gravityMs).toBe(DEFAULT_SETTINGS.game.gravityMs);
  });
});
