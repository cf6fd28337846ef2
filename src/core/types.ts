export const PIECES = ['I', 'J', 'L', 'O', 'S', 'T', 'Z'] as const;
export type PieceKind = (typeof PIECES)[number];

export type Rotation = 0 | 1 | 2 | 3;
/** (row, col) pair; rows grow downward. */
export type Vec2 = readonly [number, number];
export type Minos = readonly Vec2[];

/**
 * Board cell codes. Kinds map to 1..7 in `PIECES` order; GHOST and GARBAGE are
 * only ever written into render copies.
 */
export const Mino = {
  EMPTY: 0,
  I: 1,
  J: 2,
  L: 3,
  O: 4,
  S: 5,
  T: 6,
  Z: 7,
  GHOST: 8,
  GARBAGE: 9,
} as const;
export type Mino = (typeof Mino)[keyof typeof Mino];

export function minoOf(kind: PieceKind): number {
  return Mino[kind];
}

export function kindOf(code: number): PieceKind | null {
  return code >= 1 && code <= PIECES.length ? PIECES[code - 1] : null;
}

export function isPieceKind(value: unknown): value is PieceKind {
  return (
    typeof value === 'string' && (PIECES as readonly string[]).includes(value)
  );
}

export function rotAdd(r: Rotation, turns: number): Rotation {
  return ((((r + turns) % 4) + 4) % 4) as Rotation;
}

export interface Piece {
  kind: PieceKind;
  x: number; // row of the shape box's top edge; may sit in the hidden buffer
  y: number; // column of the shape box's left edge
  r: Rotation;
  minos: Minos;
}

export type MoveKind = 'drag' | 'rotate' | 'softDrop' | 'hardDrop' | 'swap';

export type PlayingStatus = 'playing' | 'idle' | 'stopped';

export type Seed = number | string | Uint8Array;

export interface Clock {
  /** Monotonic time in milliseconds. */
  now(): number;
}

export const MonotonicClock: Clock = {
  now: () => performance.now(),
};
