import {
  COLS,
  DEFAULT_AUTO_LOCK_MS,
  DEFAULT_LOCK_DELAY_MS,
  DEFAULT_LOCK_RESETS,
  QUEUE_SIZE,
  ROWS,
} from './constants';
import type { GameOptions } from './game';
import { MarathonGravity } from './gravity';
import { PRESETS, isPresetName, type PresetName } from './presets';
import type { Clock } from './types';

export interface GameSettings {
  preset: PresetName;
  rows: number;
  cols: number;
  /** null keeps whatever the preset starts on. */
  initialLevel: number | null;
  queueSize: number;
  can180Spin: boolean;
  canHardDrop: boolean;
  seed: number | string | null;
}

export interface GravitySettings {
  lockDelayMs: number;
  lockResets: number;
  autoLockMs: number;
}

export interface RunnerSettings {
  fixedStepMs: number;
  maxElapsedMs: number;
}

export interface Settings {
  game: GameSettings;
  gravity: GravitySettings;
  runner: RunnerSettings;
}

export type SettingsPatch = {
  [K in keyof Settings]?: Partial<Settings[K]>;
};

export const DEFAULT_SETTINGS: Settings = {
  game: {
    preset: 'modern',
    rows: ROWS,
    cols: COLS,
    initialLevel: null,
    queueSize: QUEUE_SIZE,
    can180Spin: true,
    canHardDrop: true,
    seed: null,
  },
  gravity: {
    lockDelayMs: DEFAULT_LOCK_DELAY_MS,
    lockResets: DEFAULT_LOCK_RESETS,
    autoLockMs: DEFAULT_AUTO_LOCK_MS,
  },
  runner: {
    fixedStepMs: 1000 / 60,
    maxElapsedMs: 250,
  },
};

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function int(v: unknown, min: number): number | undefined {
  return Number.isSafeInteger(v) && typeof v === 'number' && v >= min
    ? v
    : undefined;
}

function bool(v: unknown): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined;
}

function record(v: unknown): Record<string, unknown> {
  return typeof v === 'object' && v !== null ? { ...v } : {};
}

function mergeGame(base: GameSettings, raw: unknown): GameSettings {
  const patch = record(raw);
  let seed = base.seed;
  if (patch.seed === null || typeof patch.seed === 'string') {
    seed = patch.seed;
  } else if (num(patch.seed) !== undefined) {
    seed = int(patch.seed, 0) ?? base.seed;
  }
  let initialLevel = base.initialLevel;
  if (patch.initialLevel === null) initialLevel = null;
  else initialLevel = int(patch.initialLevel, 0) ?? base.initialLevel;

  return {
    preset: isPresetName(patch.preset) ? patch.preset : base.preset,
    rows: int(patch.rows, 1) ?? base.rows,
    cols: int(patch.cols, 1) ?? base.cols,
    initialLevel,
    queueSize: int(patch.queueSize, 0) ?? base.queueSize,
    can180Spin: bool(patch.can180Spin) ?? base.can180Spin,
    canHardDrop: bool(patch.canHardDrop) ?? base.canHardDrop,
    seed,
  };
}

function mergeGravity(base: GravitySettings, raw: unknown): GravitySettings {
  const patch = record(raw);
  return {
    lockDelayMs: num(patch.lockDelayMs) ?? base.lockDelayMs,
    lockResets: int(patch.lockResets, 0) ?? base.lockResets,
    autoLockMs: num(patch.autoLockMs) ?? base.autoLockMs,
  };
}

function mergeRunner(base: RunnerSettings, raw: unknown): RunnerSettings {
  const patch = record(raw);
  const fixedStepMs = num(patch.fixedStepMs);
  return {
    fixedStepMs:
      fixedStepMs !== undefined && fixedStepMs > 0
        ? fixedStepMs
        : base.fixedStepMs,
    maxElapsedMs: num(patch.maxElapsedMs) ?? base.maxElapsedMs,
  };
}

/**
 * Overlay `patch` on `base`. Fields that are missing or of the wrong type
 * keep the base value.
 */
export function mergeSettings(
  base: Settings,
  patch: SettingsPatch | unknown,
): Settings {
  const p = record(patch);
  return {
    game: mergeGame(base.game, p.game),
    gravity: mergeGravity(base.gravity, p.gravity),
    runner: mergeRunner(base.runner, p.runner),
  };
}

export function gameOptionsFromSettings(
  settings: Settings,
  clock?: Clock,
): GameOptions {
  const { game, gravity } = settings;
  if (!isPresetName(game.preset)) {
    throw new Error(`unknown preset: ${String(game.preset)}`);
  }
  const parts = PRESETS[game.preset];

  const ruleOverrides: Record<string, unknown> = {
    queueSize: game.queueSize,
    can180Spin: game.can180Spin,
    canHardDrop: game.canHardDrop,
  };
  if (game.initialLevel !== null) {
    ruleOverrides.initialLevel = game.initialLevel;
  }
  if (parts.gravity === MarathonGravity) {
    ruleOverrides['gravity.autoLockMs'] = gravity.autoLockMs;
  } else {
    ruleOverrides['gravity.lockDelayMs'] = gravity.lockDelayMs;
    ruleOverrides['gravity.lockResets'] = gravity.lockResets;
  }

  return {
    parts,
    ruleOverrides,
    boardSize: [game.rows, game.cols],
    ...(game.seed === null ? {} : { seed: game.seed }),
    ...(clock ? { clock } : {}),
  };
}
