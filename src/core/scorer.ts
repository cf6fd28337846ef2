import type { Board } from './board';
import {
  BACK_TO_BACK_PERFECT_CLEAR_POINTS,
  COMBO_POINTS,
  LINES_PER_LEVEL,
  NES_POINTS,
  NORMAL_POINTS,
  PERFECT_CLEAR_POINTS,
  TSPIN_MINI_POINTS,
  TSPIN_POINTS,
} from './constants';
import type { EnginePart, GameView } from './engine';
import type { MoveDelta } from './moves';
import type { Ruleset } from './rules';
import type { Piece, Vec2 } from './types';

export type SpinKind = 'none' | 'mini' | 'full';

// Clockwise from top-left; corner i sits between edge i - 1 and edge i.
const T_CORNERS: readonly Vec2[] = [
  [0, 0],
  [0, 2],
  [2, 2],
  [2, 0],
];
// Clockwise from top.
const T_EDGES: readonly Vec2[] = [
  [0, 1],
  [1, 2],
  [2, 1],
  [1, 0],
];

function blocked(board: Board, x: number, y: number): boolean {
  if (x < 0 || x >= board.height || y < 0 || y >= board.width) return true;
  return board.get(x, y) !== 0;
}

/**
 * Three-corner T-spin test for a T piece that just turned, with `kick` the
 * (row, col) offset the turn applied. Corners outside the board count as
 * occupied.
 */
export function detectTSpin(board: Board, piece: Piece, kick: Vec2): SpinKind {
  if (piece.kind !== 'T') return 'none';

  const corners = T_CORNERS.map(([cx, cy]) =>
    blocked(board, piece.x + cx, piece.y + cy) ? 1 : 0,
  );
  if (corners.reduce<number>((a, b) => a + b, 0) < 3) return 'none';

  // The back is the one edge the T has no mino on; the front faces it.
  const back = T_EDGES.findIndex(
    ([ex, ey]) => !piece.minos.some(([mx, my]) => mx === ex && my === ey),
  );
  if (back < 0) return 'none';

  const front = corners[(back + 2) % 4] + corners[(back + 3) % 4];
  const rear = corners[back] + corners[(back + 1) % 4];

  if (front === 2 && rear >= 1) return 'full';
  if (front === 1 && rear === 2) {
    const [dx, dy] = kick;
    return Math.abs(dx) >= 2 && Math.abs(dy) >= 1 ? 'full' : 'mini';
  }
  return 'none';
}

/** True if every row is either empty or full. */
export function isPerfectClear(board: Board): boolean {
  for (const row of board) {
    if (row.some() && !row.every()) return false;
  }
  return true;
}

export abstract class Scorer implements EnginePart {
  readonly rules: Ruleset | null = null;
  lineClears = 0;

  constructor(
    public score = 0,
    public level = 1,
  ) {}

  /** Account for one pushed move; returns the points it scored. */
  abstract judge(delta: MoveDelta): number;
}

/**
 * 2009 guideline scoring with three-corner T-spins and T-spin minis, plus the
 * perfect-clear table of recent games.
 */
export class GuidelineScorer extends Scorer {
  goal: number;
  combo = 0;
  backToBack = 0;
  /** Flags for the last judged move. */
  tspin = false;
  tspinMini = false;
  lastScore = 0;

  // spin set up by the active piece's last successful turn
  private pendingSpin: SpinKind = 'none';

  constructor(score = 0, level = 1) {
    super(score, level);
    this.goal = level * LINES_PER_LEVEL;
  }

  static fromGame(game: GameView, score?: number, level?: number): Scorer {
    return new GuidelineScorer(
      score ?? 0,
      level ?? game.rules.int('initialLevel'),
    );
  }

  judge(delta: MoveDelta): number {
    this.tspin = false;
    this.tspinMini = false;

    switch (delta.kind) {
      case 'rotate':
        if (delta.r !== 0) {
          this.pendingSpin = detectTSpin(delta.board, delta.piece, [
            delta.x,
            delta.y,
          ]);
          this.tspin = this.pendingSpin === 'full';
          this.tspinMini = this.pendingSpin === 'mini';
        }
        return this.record(0);
      case 'drag':
        if (delta.y !== 0) this.pendingSpin = 'none';
        return this.record(0);
      case 'swap':
        this.pendingSpin = 'none';
        return this.record(0);
      case 'softDrop':
        if (delta.x !== 0) this.pendingSpin = 'none';
        return this.record(this.softDrop(delta));
      case 'hardDrop':
        return this.record(this.hardDrop(delta));
    }
  }

  private record(points: number): number {
    this.lastScore = points;
    return points;
  }

  private softDrop(delta: MoveDelta): number {
    if (delta.auto) return 0;
    this.score += delta.x;
    return delta.x;
  }

  private hardDrop(delta: MoveDelta): number {
    const spin = delta.x === 0 ? this.pendingSpin : 'none';
    this.pendingSpin = 'none';
    this.tspin = spin === 'full';
    this.tspinMini = spin === 'mini';

    // drop points aren't scaled by level
    const dropPoints = delta.auto ? 0 : delta.x * 2;
    this.score += dropPoints;

    const lines = delta.clears.length;
    if (lines) {
      if (this.tspin || this.tspinMini || lines >= 4) {
        this.backToBack++;
      } else {
        this.backToBack = 0;
      }
      this.combo++;
    } else {
      this.combo = 0;
    }

    const perfectClear = isPerfectClear(delta.board);
    const i = Math.min(lines, 4);
    let points: number;
    if (perfectClear) {
      points = PERFECT_CLEAR_POINTS[i];
    } else if (this.tspin) {
      points = TSPIN_POINTS[i];
    } else if (this.tspinMini) {
      points = TSPIN_MINI_POINTS[i];
    } else {
      points = NORMAL_POINTS[i];
    }

    if (this.combo) points += COMBO_POINTS * (this.combo - 1);

    points *= this.level;

    if (this.backToBack > 1) {
      points = Math.floor((points * 3) / 2);
      if (perfectClear) {
        points += BACK_TO_BACK_PERFECT_CLEAR_POINTS * this.level;
      }
    }

    this.score += points;
    this.lineClears += lines;
    while (this.lineClears >= this.goal) {
      this.goal += LINES_PER_LEVEL;
      this.level++;
    }
    return dropPoints + points;
  }
}

/**
 * Classic console scoring: 40/100/300/1200 times (level + 1), no spins,
 * combos or back-to-back. Levels start at 0.
 */
export class NesScorer extends Scorer {
  static readonly ruleOverrides = { initialLevel: 0 };

  goal: number;

  constructor(score = 0, level = 0, initialLevel = level) {
    super(score, level);
    this.goal = Math.min(
      initialLevel * 10 + 10,
      Math.max(100, initialLevel * 10 - 50),
    );
  }

  static fromGame(game: GameView, score?: number, level?: number): Scorer {
    const initialLevel = game.rules.int('initialLevel');
    return new NesScorer(score ?? 0, level ?? initialLevel, initialLevel);
  }

  judge(delta: MoveDelta): number {
    if (delta.kind === 'softDrop' || delta.kind === 'hardDrop') {
      // classic games have no hard drop bonus; counted like a soft drop
      const dropPoints = delta.auto ? 0 : delta.x;
      this.score += dropPoints;
      if (delta.kind === 'softDrop') return dropPoints;

      const lines = delta.clears.length;
      const points = NES_POINTS[Math.min(lines, 4)] * (this.level + 1);
      this.score += points;
      this.lineClears += lines;
      if (this.lineClears >= this.goal) {
        this.level++;
        this.goal = this.lineClears + LINES_PER_LEVEL;
      }
      return dropPoints + points;
    }
    return 0;
  }
}
