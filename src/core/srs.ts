import type { PieceKind, Rotation, Vec2 } from './types';

// All tables are (row, col) with rows growing downward, relative to the
// top-left corner of each kind's bounding box.

export type ShapeTable = Record<PieceKind, readonly (readonly Vec2[])[]>;

export type KickTable = Readonly<
  Partial<Record<Rotation, Partial<Record<Rotation, readonly Vec2[]>>>>
>;

export const SRS_SHAPES: ShapeTable = {
  I: [
    [[1, 0], [1, 1], [1, 2], [1, 3]],
    [[0, 2], [1, 2], [2, 2], [3, 2]],
    [[2, 0], [2, 1], [2, 2], [2, 3]],
    [[0, 1], [1, 1], [2, 1], [3, 1]],
  ],
  J: [
    [[0, 0], [1, 0], [1, 1], [1, 2]],
    [[0, 1], [0, 2], [1, 1], [2, 1]],
    [[1, 0], [1, 1], [1, 2], [2, 2]],
    [[0, 1], [1, 1], [2, 0], [2, 1]],
  ],
  L: [
    [[0, 2], [1, 0], [1, 1], [1, 2]],
    [[0, 1], [1, 1], [2, 1], [2, 2]],
    [[1, 0], [1, 1], [1, 2], [2, 0]],
    [[0, 0], [0, 1], [1, 1], [2, 1]],
  ],
  O: [
    [[0, 1], [0, 2], [1, 1], [1, 2]],
    [[0, 1], [0, 2], [1, 1], [1, 2]],
    [[0, 1], [0, 2], [1, 1], [1, 2]],
    [[0, 1], [0, 2], [1, 1], [1, 2]],
  ],
  S: [
    [[0, 1], [0, 2], [1, 0], [1, 1]],
    [[0, 1], [1, 1], [1, 2], [2, 2]],
    [[1, 1], [1, 2], [2, 0], [2, 1]],
    [[0, 0], [1, 0], [1, 1], [2, 1]],
  ],
  T: [
    [[0, 1], [1, 0], [1, 1], [1, 2]],
    [[0, 1], [1, 1], [1, 2], [2, 1]],
    [[1, 0], [1, 1], [1, 2], [2, 1]],
    [[0, 1], [1, 0], [1, 1], [2, 1]],
  ],
  Z: [
    [[0, 0], [0, 1], [1, 1], [1, 2]],
    [[0, 2], [1, 1], [1, 2], [2, 1]],
    [[1, 0], [1, 1], [2, 1], [2, 2]],
    [[0, 1], [1, 0], [1, 1], [2, 0]],
  ],
};

// SRS wall kicks, tried after the unkicked fit. Only quarter turns.
export const SRS_KICKS: KickTable = {
  0: {
    1: [[0, -1], [-1, -1], [2, 0], [2, -1]],
    3: [[0, 1], [-1, 1], [2, 0], [2, 1]],
  },
  1: {
    0: [[0, 1], [1, 1], [-2, 0], [-2, 1]],
    2: [[0, 1], [1, 1], [-2, 0], [-2, 1]],
  },
  2: {
    1: [[0, -1], [-1, -1], [2, 0], [2, -1]],
    3: [[0, 1], [-1, 1], [2, 0], [2, 1]],
  },
  3: {
    0: [[0, -1], [1, -1], [-2, 0], [-2, -1]],
    2: [[0, -1], [1, -1], [-2, 0], [-2, -1]],
  },
};

export const SRS_I_KICKS: KickTable = {
  0: {
    1: [[0, -2], [0, 1], [1, -2], [-2, 1]],
    3: [[0, -1], [0, 2], [-2, -1], [1, 2]],
  },
  1: {
    0: [[0, 2], [0, -1], [-1, 2], [2, -1]],
    2: [[0, -1], [0, 2], [-2, -1], [1, 2]],
  },
  2: {
    1: [[0, 1], [0, -2], [2, 1], [-1, -2]],
    3: [[0, 2], [0, -1], [-1, 2], [2, -1]],
  },
  3: {
    0: [[0, 1], [0, -2], [2, 1], [-1, -2]],
    2: [[0, -2], [0, 1], [1, -2], [-2, 1]],
  },
};

// TETR.IO's 180 kicks, shared by every kind.
export const TETRIO_180_KICKS: KickTable = {
  0: { 2: [[-1, 0], [-1, 1], [-1, -1], [0, 1], [0, -1]] },
  1: { 3: [[0, 1], [-2, 1], [-1, 1], [-2, 0], [-1, 0]] },
  2: { 0: [[1, 0], [1, -1], [1, 1], [0, -1], [0, 1]] },
  3: { 1: [[0, -1], [-2, -1], [-1, -1], [-2, 0], [-1, 0]] },
};

const ROTATIONS: readonly Rotation[] = [0, 1, 2, 3];

/** Layer `extra` over `base`, (from, to) entry by entry. */
export function extendKicks(base: KickTable, extra: KickTable): KickTable {
  const out: Partial<Record<Rotation, Partial<Record<Rotation, readonly Vec2[]>>>> =
    {};
  for (const r of ROTATIONS) {
    out[r] = { ...base[r], ...extra[r] };
  }
  return out;
}

export function getKickTests(
  table: KickTable,
  from: Rotation,
  to: Rotation,
): readonly Vec2[] | null {
  return table[from]?.[to] ?? null;
}
