import type { Board } from './board';
import type { EnginePart, GameView } from './engine';
import type { Ruleset } from './rules';
import {
  SRS_I_KICKS,
  SRS_KICKS,
  SRS_SHAPES,
  TETRIO_180_KICKS,
  extendKicks,
  getKickTests,
  type KickTable,
  type ShapeTable,
} from './srs';
import {
  rotAdd,
  type Minos,
  type Piece,
  type PieceKind,
  type Rotation,
} from './types';

/**
 * Places and turns pieces on a board. `overlaps` is the one collision test
 * every movement, rotation, spawn and loss check goes through.
 */
export abstract class RotationSystem implements EnginePart {
  readonly rules: Ruleset | null = null;

  constructor(protected readonly board: Board) {}

  abstract spawn(kind: PieceKind): Piece;

  /**
   * Turn `piece` in place by `turns` clockwise quarter turns. Returns false and
   * leaves the piece untouched when no placement fits.
   */
  abstract rotate(piece: Piece, turns: number): boolean;

  overlaps(piece: Piece): boolean {
    return this.overlapsAt(piece.minos, piece.x, piece.y);
  }

  overlapsAt(minos: Minos, px: number, py: number): boolean {
    const { height, width } = this.board;
    for (const [dx, dy] of minos) {
      const x = px + dx;
      const y = py + dy;
      if (x < 0 || x >= height || y < 0 || y >= width) return true;
      if (this.board.get(x, y) !== 0) return true;
    }
    return false;
  }
}

/**
 * Super Rotation System, as found in guideline games. 180° turns only succeed
 * unkicked; see `TetrioSRS` for 180° kicks.
 */
export class SRS extends RotationSystem {
  protected readonly shapes: ShapeTable = SRS_SHAPES;
  protected readonly kicks: KickTable = SRS_KICKS;
  protected readonly iKicks: KickTable = SRS_I_KICKS;

  static fromGame(game: GameView): RotationSystem {
    return new this(game.board);
  }

  spawn(kind: PieceKind): Piece {
    const { height, width } = this.board;
    return {
      kind,
      // just above the visible area
      x: Math.floor(height / 2) - 2,
      // centred, leaning left
      y: Math.floor((width + 3) / 2) - 3,
      r: 0,
      minos: this.shapes[kind][0],
    };
  }

  rotate(piece: Piece, turns: number): boolean {
    const to = rotAdd(piece.r, turns);
    if (to === piece.r) return false;
    const minos = this.shapes[piece.kind][to];

    if (!this.overlapsAt(minos, piece.x, piece.y)) {
      this.apply(piece, to, 0, 0);
      return true;
    }

    const table = piece.kind === 'I' ? this.iKicks : this.kicks;
    const tests = getKickTests(table, piece.r, to) ?? [];
    for (const [dx, dy] of tests) {
      if (!this.overlapsAt(minos, piece.x + dx, piece.y + dy)) {
        this.apply(piece, to, dx, dy);
        return true;
      }
    }
    return false;
  }

  private apply(piece: Piece, to: Rotation, dx: number, dy: number): void {
    piece.x += dx;
    piece.y += dy;
    piece.r = to;
    piece.minos = this.shapes[piece.kind][to];
  }
}

/** SRS plus TETR.IO's 180° kick table. */
export class TetrioSRS extends SRS {
  protected readonly kicks: KickTable = extendKicks(
    SRS_KICKS,
    TETRIO_180_KICKS,
  );
  protected readonly iKicks: KickTable = extendKicks(
    SRS_I_KICKS,
    TETRIO_180_KICKS,
  );
}

/** Classic rotation: a turn either fits in place or doesn't happen. */
export class NoKicks extends SRS {
  protected readonly kicks: KickTable = {};
  protected readonly iKicks: KickTable = {};
}
