import { COLS, ROWS } from './constants';
import { Mino, kindOf } from './types';

const TILES: Record<number, string> = {
  [Mino.EMPTY]: '.',
  [Mino.GHOST]: '@',
  [Mino.GARBAGE]: 'X',
};

function normalizeIndex(index: number, length: number, axis: number): number {
  if (!Number.isInteger(index)) {
    throw new TypeError(`board indices must be integers, not ${index}`);
  }
  const i = index < 0 ? index + length : index;
  if (i < 0 || i >= length) {
    throw new RangeError(`board index ${index} out of bounds for axis ${axis}`);
  }
  return i;
}

function clampSliceIndex(index: number, length: number): number {
  if (index < 0) return Math.max(0, index + length);
  return Math.min(index, length);
}

function checkValue(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new TypeError(`board values must be integers in 0..255, not ${value}`);
  }
  return value;
}

function tileOf(code: number): string {
  return TILES[code] ?? kindOf(code) ?? '?';
}

/**
 * One board row. Always a view: writes go to the owning board's storage.
 */
export class BoardRow implements Iterable<number> {
  constructor(
    private readonly data: Uint8Array,
    private readonly offset: number,
    private readonly stride: number,
    readonly length: number,
  ) {}

  get(col: number): number {
    const i = normalizeIndex(col, this.length, 1);
    return this.data[this.offset + i * this.stride];
  }

  set(col: number, value: number): void {
    const i = normalizeIndex(col, this.length, 1);
    this.data[this.offset + i * this.stride] = checkValue(value);
  }

  fill(value: number): void {
    const v = checkValue(value);
    for (let i = 0; i < this.length; i++) {
      this.data[this.offset + i * this.stride] = v;
    }
  }

  /** True if every cell is nonzero. */
  every(): boolean {
    for (const cell of this) if (cell === 0) return false;
    return true;
  }

  /** True if any cell is nonzero. */
  some(): boolean {
    for (const cell of this) if (cell !== 0) return true;
    return false;
  }

  toArray(): number[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i < this.length; i++) {
      yield this.data[this.offset + i * this.stride];
    }
  }
}

/**
 * Row-major 2D grid of mino codes over a flat byte buffer.
 *
 * Indexing and slicing never copy: `row()` and `slice()` return views that
 * share this board's storage, addressed by an offset plus per-axis strides.
 * `copy()` is the only way to get independent storage.
 */
export class Board implements Iterable<BoardRow> {
  private constructor(
    private readonly data: Uint8Array,
    readonly height: number,
    readonly width: number,
    private readonly offset: number,
    private readonly rowStride: number,
    private readonly colStride: number,
    /** The board owning the storage, or null if this board owns it. */
    readonly base: Board | null,
  ) {}

  static zeros(shape: readonly [number, number] = [ROWS * 2, COLS]): Board {
    const [height, width] = shape;
    if (!Number.isInteger(height) || height <= 0) {
      throw new RangeError(`board axis 0 must have non-zero length: ${height}`);
    }
    if (!Number.isInteger(width) || width <= 0) {
      throw new RangeError(`board axis 1 must have non-zero length: ${width}`);
    }
    const data = new Uint8Array(height * width);
    return new Board(data, height, width, 0, width, 1, null);
  }

  static from(rows: ArrayLike<ArrayLike<number>>): Board {
    if (rows.length === 0) {
      throw new RangeError('board axis 0 must have non-zero length');
    }
    const width = rows[0].length;
    const board = Board.zeros([rows.length, width]);
    for (let r = 0; r < rows.length; r++) {
      const row = rows[r];
      if (row.length !== width) {
        throw new RangeError(
          `board rows must all have length ${width}, row ${r} has ${row.length}`,
        );
      }
      for (let c = 0; c < width; c++) {
        board.data[r * width + c] = checkValue(row[c]);
      }
    }
    return board;
  }

  get shape(): [number, number] {
    return [this.height, this.width];
  }

  private index(row: number, col: number): number {
    return (
      this.offset +
      normalizeIndex(row, this.height, 0) * this.rowStride +
      normalizeIndex(col, this.width, 1) * this.colStride
    );
  }

  get(row: number, col: number): number {
    return this.data[this.index(row, col)];
  }

  set(row: number, col: number, value: number): void {
    this.data[this.index(row, col)] = checkValue(value);
  }

  row(index: number): BoardRow {
    const i = normalizeIndex(index, this.height, 0);
    return new BoardRow(
      this.data,
      this.offset + i * this.rowStride,
      this.colStride,
      this.width,
    );
  }

  /** Rows `[start, stop)` as a view; indices behave like `Array#slice`. */
  slice(start = 0, stop = this.height): Board {
    const from = clampSliceIndex(start, this.height);
    const to = Math.max(from, clampSliceIndex(stop, this.height));
    if (to === from) {
      throw new RangeError(`board slice [${start}, ${stop}) is empty`);
    }
    return new Board(
      this.data,
      to - from,
      this.width,
      this.offset + from * this.rowStride,
      this.rowStride,
      this.colStride,
      this.base ?? this,
    );
  }

  setRow(index: number, values: ArrayLike<number>): void {
    if (values.length !== this.width) {
      throw new RangeError(
        `can't broadcast row of length ${values.length} into ${this.width}`,
      );
    }
    const row = this.row(index);
    for (let c = 0; c < this.width; c++) row.set(c, values[c]);
  }

  fill(value: number): void {
    for (const row of this) row.fill(value);
  }

  isRowFull(index: number): boolean {
    return this.row(index).every();
  }

  isRowEmpty(index: number): boolean {
    return !this.row(index).some();
  }

  /**
   * Remove row `index`: rows above it move down by one and row 0 is zeroed.
   */
  clearRow(index: number): void {
    const target = normalizeIndex(index, this.height, 0);
    for (let r = target; r > 0; r--) {
      const above = this.offset + (r - 1) * this.rowStride;
      const here = this.offset + r * this.rowStride;
      for (let c = 0; c < this.width; c++) {
        this.data[here + c * this.colStride] =
          this.data[above + c * this.colStride];
      }
    }
    this.row(0).fill(Mino.EMPTY);
  }

  copy(): Board {
    return Board.from(this.toArray());
  }

  toArray(): number[][] {
    return Array.from(this, (row) => row.toArray());
  }

  equals(other: Board): boolean {
    if (other.height !== this.height || other.width !== this.width) {
      return false;
    }
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) {
        if (this.get(r, c) !== other.get(r, c)) return false;
      }
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<BoardRow> {
    for (let r = 0; r < this.height; r++) yield this.row(r);
  }

  toString(): string {
    return Array.from(this, (row) =>
      Array.from(row, (code) => tileOf(code)).join(' '),
    ).join('\n');
  }
}
