import type { Board } from './board';
import type { MoveKind, Piece } from './types';

/**
 * A requested move. `x` is rows (downward), `y` is columns (rightward) and `r`
 * is clockwise quarter turns; negative values go the other way.
 */
export interface Move {
  readonly kind: MoveKind;
  readonly x: number;
  readonly y: number;
  readonly r: number;
  /** True when produced by gravity rather than the player. */
  readonly auto: boolean;
}

export function makeMove(
  kind: MoveKind,
  { x = 0, y = 0, r = 0, auto = false }: Partial<Omit<Move, 'kind'>> = {},
): Move {
  return { kind, x, y, r, auto };
}

export const Move = {
  /** Horizontal move; negative is leftward. */
  drag: (tiles: number): Move => makeMove('drag', { y: tiles }),
  left: (tiles = 1): Move => makeMove('drag', { y: -tiles }),
  right: (tiles = 1): Move => makeMove('drag', { y: tiles }),
  rotate: (turns = 1): Move => makeMove('rotate', { r: turns }),
  hardDrop: (): Move => makeMove('hardDrop'),
  softDrop: (tiles = 1): Move => makeMove('softDrop', { x: tiles }),
  swap: (): Move => makeMove('swap'),
};

/**
 * What a pushed move actually did. `rx/ry/rr` echo the request; `x/y/r` are
 * the offsets applied after collision clipping (new minus old).
 */
export interface MoveDelta {
  kind: MoveKind;
  auto: boolean;
  rx: number;
  ry: number;
  rr: number;
  x: number;
  y: number;
  r: number;
  /** Cleared row indices, in detection order. */
  clears: number[];
  /** The piece the move acted on; for a hard drop, the piece as locked. */
  piece: Piece;
  board: Board;
}
