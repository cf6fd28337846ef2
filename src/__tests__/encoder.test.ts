import { describe, expect, it } from 'vitest';
import { Board } from '../core/board';
import {
  decode,
  decodeString,
  encode,
  encodeString,
} from '../core/encoder';

describe('encode', () => {
  it('packs two cells per byte after the header', () => {
    const board = Board.from([
      [0, 0],
      [1, 2],
      [0, 9],
    ]);
    expect([...encode(board)]).toEqual([
      0, 3, 2, 0, 0, 0, 0, 0, 0, 0x12, 0x09,
    ]);
    expect(encodeString(board)).toBe('AAMCAAAAAAAAEgk=');
  });

  it('keeps one empty row when the trimmed cells are odd', () => {
    const board = Board.from([
      [0, 0, 0],
      [0, 0, 0],
      [0, 5, 7],
    ]);
    const bytes = encode(board);
    expect([...bytes.subarray(9)]).toEqual([0x00, 0x05, 0x07]);
    expect(decode(bytes).board.equals(board)).toBe(true);
  });

  it('pads above a full board with an odd cell count', () => {
    const board = Board.from([
      [1, 0, 0],
      [0, 2, 0],
      [0, 0, 3],
    ]);
    const bytes = encode(board);
    expect(bytes).toHaveLength(15);
    expect([...bytes.subarray(9, 11)]).toEqual([0x00, 0x01]);
    expect(decode(bytes).board.toArray()).toEqual(board.toArray());
  });

  it('stores only the header for an empty board', () => {
    const bytes = encode(Board.zeros([2, 2]));
    expect(bytes).toHaveLength(9);
    expect(decode(bytes).board.toArray()).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });

  it('stores the active piece with signed offsets', () => {
    const board = Board.zeros([4, 4]);
    board.set(3, 0, 9);
    const piece = { kind: 'I', x: 18, y: -1, r: 1 } as const;

    const bytes = encode(board, piece);
    expect([...bytes.subarray(0, 9)]).toEqual([
      1, 4, 4, 1, 0, 18, 0xff, 0xff, 1,
    ]);

    const decoded = decodeString(encodeString(board, piece));
    expect(decoded.piece).toEqual(piece);
    expect(decoded.board.get(3, 0)).toBe(9);
  });

  it('keeps pieces low on boards taller than 128 rows', () => {
    const board = Board.zeros([200, 10]);
    board.set(199, 0, 9);
    const piece = { kind: 'T', x: 197, y: 3, r: 0 } as const;

    const bytes = encode(board, piece);
    expect([...bytes.subarray(4, 8)]).toEqual([0, 197, 0, 3]);

    const decoded = decode(bytes);
    expect(decoded.piece).toEqual(piece);
    expect(decoded.board.equals(board)).toBe(true);
  });

  it('decodes without a piece', () => {
    expect(decode(encode(Board.zeros([2, 2]))).piece).toBeNull();
  });

  it('rejects cells wider than four bits', () => {
    expect(() => encode(Board.from([[16, 0]]))).toThrow(RangeError);
  });

  it('rejects piece offsets beyond 16 bits', () => {
    expect(() =>
      encode(Board.zeros([2, 2]), { kind: 'T', x: 40_000, y: 0, r: 0 }),
    ).toThrow('piece x 40000 does not fit in 16 bits');
  });
});

describe('decode', () => {
  it('rejects malformed input', () => {
    expect(() => decode(new Uint8Array([0, 2, 2]))).toThrow(RangeError);
    expect(() =>
      decode(new Uint8Array([0, 0, 2, 0, 0, 0, 0, 0, 0])),
    ).toThrow(RangeError);
    expect(() =>
      decode(new Uint8Array([1, 2, 2, 8, 0, 0, 0, 0, 0])),
    ).toThrow('encoded piece has unknown kind 8');
    expect(() =>
      decode(new Uint8Array([0, 2, 3, 0, 0, 0, 0, 0, 0, 0x11])),
    ).toThrow(RangeError);
  });
});
