import { Board } from './board';
import { kindOf, minoOf, rotAdd, type PieceKind, type Rotation } from './types';

const HAS_PIECE = 1 << 0;
const HEADER_BYTES = 9;

/** Piece placement as stored in an encoded board. */
export interface EncodedPiece {
  kind: PieceKind;
  x: number;
  y: number;
  r: Rotation;
}

export interface DecodedBoard {
  board: Board;
  piece: EncodedPiece | null;
}

function toByte(n: number, what: string): number {
  if (!Number.isInteger(n) || n < 0 || n > 0xff) {
    throw new RangeError(`${what} ${n} does not fit in a byte`);
  }
  return n;
}

function toInt16(n: number, what: string): number {
  if (!Number.isInteger(n) || n < -0x8000 || n > 0x7fff) {
    throw new RangeError(`${what} ${n} does not fit in 16 bits`);
  }
  return n;
}

/**
 * Pack a board (and optionally the active piece) into bytes:
 *
 *   flags, height, width, kind, x (int16), y (int16), r, cells...
 *
 * Cells are two per byte, high nibble first, with leading empty rows
 * dropped. When that leaves an odd number of cells an empty row is put back
 * in front.
 */
export function encode(
  board: Board,
  piece: EncodedPiece | null = null,
): Uint8Array {
  const { height, width } = board;

  let top = 0;
  while (top < height && board.isRowEmpty(top)) top++;
  if (((height - top) * width) % 2 !== 0) top--;

  const cells: number[] = [];
  for (let r = top; r < height; r++) {
    for (let c = 0; c < width; c++) {
      const v = r < 0 ? 0 : board.get(r, c);
      if (v > 0xf) {
        throw new RangeError(`cell (${r}, ${c}) = ${v} does not fit in 4 bits`);
      }
      cells.push(v);
    }
  }

  const out = new Uint8Array(HEADER_BYTES + cells.length / 2);
  out[0] = piece ? HAS_PIECE : 0;
  out[1] = toByte(height, 'board height');
  out[2] = toByte(width, 'board width');
  if (piece) {
    const view = new DataView(out.buffer);
    out[3] = minoOf(piece.kind);
    // offsets are signed (an I piece against the left wall has y < 0)
    view.setInt16(4, toInt16(piece.x, 'piece x'));
    view.setInt16(6, toInt16(piece.y, 'piece y'));
    out[8] = piece.r;
  }
  for (let i = 0; i < cells.length; i += 2) {
    out[HEADER_BYTES + i / 2] = (cells[i] << 4) | cells[i + 1];
  }
  return out;
}

export function decode(bytes: Uint8Array): DecodedBoard {
  if (bytes.length < HEADER_BYTES) {
    throw new RangeError(
      `encoded board needs at least ${HEADER_BYTES} bytes, got ${bytes.length}`,
    );
  }
  const [flags, height, width] = bytes;
  if (height === 0 || width === 0) {
    throw new RangeError(`encoded board has an empty shape ${height}x${width}`);
  }

  let piece: EncodedPiece | null = null;
  if (flags & HAS_PIECE) {
    const kind = kindOf(bytes[3]);
    if (kind === null) {
      throw new RangeError(`encoded piece has unknown kind ${bytes[3]}`);
    }
    const view = new DataView(
      bytes.buffer,
      bytes.byteOffset,
      bytes.byteLength,
    );
    piece = {
      kind,
      x: view.getInt16(4),
      y: view.getInt16(6),
      r: rotAdd(0, bytes[8]),
    };
  }

  const cells: number[] = [];
  for (const byte of bytes.subarray(HEADER_BYTES)) {
    cells.push(byte >> 4, byte & 0xf);
  }
  const rows = Math.floor(cells.length / width);
  if (rows * width !== cells.length || rows > height + 1) {
    throw new RangeError(
      `encoded board body has ${cells.length} cells, not whole rows of ${width}`,
    );
  }

  const board = Board.zeros([height, width]);
  // a padding row can sit above the board when nothing was trimmed
  const skip = Math.max(0, rows - height);
  for (let r = skip; r < rows; r++) {
    for (let c = 0; c < width; c++) {
      board.set(height - rows + r, c, cells[r * width + c]);
    }
  }
  return { board, piece };
}

export function encodeString(
  board: Board,
  piece: EncodedPiece | null = null,
): string {
  return Buffer.from(encode(board, piece)).toString('base64');
}

export function decodeString(text: string): DecodedBoard {
  return decode(new Uint8Array(Buffer.from(text, 'base64')));
}
