export const ROWS = 20;
export const COLS = 10;
export const QUEUE_SIZE = 4;
export const INITIAL_LEVEL = 1;

export const DEFAULT_LOCK_DELAY_MS = 500;
export const DEFAULT_LOCK_RESETS = 15;
export const DEFAULT_AUTO_LOCK_MS = 30_000;

// 20G at 60 frames per second.
export const MIN_DROP_DELAY_MS = 1000 / 60 / 20;

export const LINES_PER_LEVEL = 10;

export const NORMAL_POINTS = [0, 100, 300, 500, 800] as const;
export const TSPIN_POINTS = [400, 800, 1200, 1600, 0] as const;
export const TSPIN_MINI_POINTS = [100, 200, 400, 0, 0] as const;
export const PERFECT_CLEAR_POINTS = [0, 800, 1200, 1800, 2000] as const;
export const NES_POINTS = [0, 40, 100, 300, 1200] as const;

export const COMBO_POINTS = 50;
export const BACK_TO_BACK_PERFECT_CLEAR_POINTS = 200;
