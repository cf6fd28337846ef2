import { describe, expect, it } from 'vitest';
import { Board } from '../core/board';

describe('Board', () => {
  it('defaults to a 40x10 zeroed board', () => {
    const board = Board.zeros();
    expect(board.shape).toEqual([40, 10]);
    expect(board.height).toBe(40);
    expect(board.width).toBe(10);
    expect([...board].every((row) => !row.some())).toBe(true);
  });

  it('wraps negative indices and rejects out of range ones', () => {
    const board = Board.zeros([4, 3]);
    board.set(-1, -1, 5);
    expect(board.get(3, 2)).toBe(5);
    expect(board.get(-4, 0)).toBe(0);

    expect(() => board.get(4, 0)).toThrow(RangeError);
    expect(() => board.get(-5, 0)).toThrow(RangeError);
    expect(() => board.get(0, 3)).toThrow(RangeError);
    expect(() => board.row(0).get(-4)).toThrow(RangeError);
  });

  it('rejects cell values that are not bytes', () => {
    const board = Board.zeros([2, 2]);
    expect(() => board.set(0, 0, 256)).toThrow(TypeError);
    expect(() => board.set(0, 0, 1.5)).toThrow(TypeError);
    expect(() => board.set(0, 0, -1)).toThrow(TypeError);
  });

  it('rejects empty or ragged shapes', () => {
    expect(() => Board.zeros([0, 10])).toThrow(RangeError);
    expect(() => Board.zeros([10, 0])).toThrow(RangeError);
    expect(() => Board.from([])).toThrow(RangeError);
    expect(() => Board.from([[1, 2], [3]])).toThrow(RangeError);
  });

  it('slices rows as views over the same storage', () => {
    const board = Board.zeros([6, 3]);
    const view = board.slice(2, 4);
    expect(view.shape).toEqual([2, 3]);
    expect(view.base).toBe(board);

    view.set(0, 1, 3);
    expect(board.get(2, 1)).toBe(3);

    const tail = board.slice(-2);
    tail.row(1).fill(7);
    expect(board.isRowFull(5)).toBe(true);

    // views of views still point at the owner
    expect(view.slice(1).base).toBe(board);
  });

  it('throws on an empty slice', () => {
    const board = Board.zeros([4, 2]);
    expect(() => board.slice(3, 3)).toThrow(RangeError);
    expect(() => board.slice(5)).toThrow(RangeError);
  });

  it('clears a row by shifting everything above it down', () => {
    const board = Board.from([
      [1, 0],
      [2, 2],
      [0, 3],
    ]);
    board.clearRow(1);
    expect(board.toArray()).toEqual([
      [0, 0],
      [1, 0],
      [0, 3],
    ]);
  });

  it('clears rows inside a view without touching rows outside it', () => {
    const board = Board.from([[4], [5], [6], [7]]);
    board.slice(1, 3).clearRow(1);
    expect(board.toArray()).toEqual([[4], [0], [5], [7]]);
  });

  it('copies into independent storage', () => {
    const board = Board.from([
      [0, 1],
      [1, 1],
    ]);
    const copy = board.copy();
    expect(copy.equals(board)).toBe(true);
    expect(copy.base).toBeNull();

    copy.set(0, 0, 4);
    expect(board.get(0, 0)).toBe(0);
    expect(copy.equals(board)).toBe(false);
  });

  it('reports full and empty rows', () => {
    const board = Board.from([
      [0, 0, 0],
      [1, 0, 2],
      [3, 4, 5],
    ]);
    expect(board.isRowEmpty(0)).toBe(true);
    expect(board.isRowEmpty(1)).toBe(false);
    expect(board.isRowFull(1)).toBe(false);
    expect(board.isRowFull(2)).toBe(true);
  });

  it('prints kinds, ghosts and garbage', () => {
    const board = Board.from([
      [0, 1, 8],
      [9, 6, 0],
    ]);
    expect(board.toString()).toBe('. I @\nX T .');
  });

  it('sets whole rows with matching width only', () => {
    const board = Board.zeros([2, 3]);
    board.setRow(-1, [1, 2, 3]);
    expect(board.row(1).toArray()).toEqual([1, 2, 3]);
    expect(() => board.setRow(0, [1, 2])).toThrow(RangeError);
  });
});
