import { Board } from './board';
import { COLS, INITIAL_LEVEL, QUEUE_SIZE, ROWS } from './constants';
import { partFactories, type EngineParts, type GameView } from './engine';
import type { Gravity } from './gravity';
import { Move, type MoveDelta } from './moves';
import { Modern } from './presets';
import type { Queue } from './queue';
import type { RotationSystem } from './rotation';
import { Rule, Ruleset, type BoardSize, type RuleOverrides } from './rules';
import type { Scorer } from './scorer';
import {
  Mino,
  MonotonicClock,
  minoOf,
  type Clock,
  type Piece,
  type PieceKind,
  type PlayingStatus,
  type Seed,
} from './types';

export interface GameOptions {
  /** Engine parts; defaults to the `Modern` preset. */
  parts?: EngineParts;
  /** Applied last; these always win. */
  ruleOverrides?: RuleOverrides;
  /** Internal board, twice as tall as the visible playfield. */
  board?: Board | ArrayLike<ArrayLike<number>>;
  /** Pieces to start the queue with. */
  queue?: readonly PieceKind[];
  /**
   * Level handed to the scorer; defaults to the `initialLevel` rule. Meant
   * for restoring saved games.
   */
  level?: number;
  score?: number;
  /** Shorthand for the `seed` rule. */
  seed?: Seed;
  /** Shorthand for the `boardSize` rule (visible rows, columns). */
  boardSize?: BoardSize;
  clock?: Clock;
}

function assert(condition: boolean, message: string): asserts condition {
  if (!condition) throw new Error(`assertion failed: ${message}`);
}

function coreRules(): Ruleset {
  return new Ruleset(null, [
    new Rule('boardSize', 'size', [ROWS, COLS]),
    new Rule('initialLevel', 'int', INITIAL_LEVEL),
    new Rule('queueSize', 'int', QUEUE_SIZE),
    new Rule('seed', 'seed', null),
    new Rule('can180Spin', 'boolean', true),
    new Rule('canHardDrop', 'boolean', true),
  ]);
}

/**
 * A single game: owns the board, the four engine parts and the active piece,
 * and applies moves to them.
 */
export class Game implements GameView {
  /** Part factories; replacing a slot takes effect on `reset()`. */
  readonly parts: EngineParts;
  readonly rules: Ruleset;
  readonly board: Board;
  readonly clock: Clock;

  gravity: Gravity;
  queue: Queue;
  rs: RotationSystem;
  scorer: Scorer;

  piece: Piece;
  status: PlayingStatus = 'playing';
  /** What the last pushed move did; null before the first move. */
  delta: MoveDelta | null = null;
  hold: PieceKind | null = null;
  /** Set once the active piece was swapped; cleared on lock. */
  holdLock = false;

  // factories the current part instances were built from
  private built: EngineParts;

  constructor(options: GameOptions = {}) {
    this.parts = { ...(options.parts ?? Modern) };
    this.built = { ...this.parts };
    this.clock = options.clock ?? MonotonicClock;
    this.rules = coreRules();

    if (options.seed !== undefined) this.rules.set('seed', options.seed);
    if (options.boardSize !== undefined) {
      this.rules.set('boardSize', options.boardSize);
    }

    if (options.board === undefined) {
      const [rows, cols] = this.rules.size('boardSize');
      // the hidden half above the playfield buffers pieces pushed out of view
      this.board = Board.zeros([rows * 2, cols]);
    } else if (options.board instanceof Board) {
      this.board = options.board;
    } else {
      this.board = Board.from(options.board);
    }

    for (const part of partFactories(this.parts)) {
      if (part.ruleOverrides) this.rules.override(part.ruleOverrides);
    }

    // core rules are read while building parts, so those overrides go first
    const overrides = options.ruleOverrides ?? {};
    this.rules.override(
      Object.fromEntries(
        Object.entries(overrides).filter(([name]) => this.rules.has(name)),
      ),
    );

    const level = options.level ?? this.rules.int('initialLevel');
    this.gravity = this.parts.gravity.fromGame(this);
    this.queue = this.parts.queue.fromGame(this, options.queue);
    this.rs = this.parts.rotationSystem.fromGame(this);
    this.scorer = this.parts.scorer.fromGame(this, options.score ?? 0, level);

    for (const part of this.engineParts()) {
      if (part.rules) this.rules.register(part.rules);
    }

    this.rules.override(overrides);

    this.queue.size = this.rules.int('queueSize');
    this.piece = this.rs.spawn(this.queue.pop());
    if (this.rs.overlaps(this.piece)) this.lose();
  }

  private engineParts() {
    return [this.gravity, this.queue, this.rs, this.scorer] as const;
  }

  get score(): number {
    return this.scorer.score;
  }

  set score(value: number) {
    this.scorer.score = value;
  }

  get level(): number {
    return this.scorer.level;
  }

  set level(value: number) {
    this.scorer.level = value;
  }

  get seed(): Seed {
    return this.queue.seed;
  }

  /** Visible rows: half the internal board. */
  get height(): number {
    return Math.floor(this.board.height / 2);
  }

  get width(): number {
    return this.board.width;
  }

  get playing(): boolean {
    return this.status === 'playing';
  }

  get paused(): boolean {
    return this.status === 'idle';
  }

  get lost(): boolean {
    return this.status === 'stopped';
  }

  /** The visible board with the active and ghost pieces drawn in. */
  get playfield(): Board {
    return this.getPlayfield(0);
  }

  /**
   * A copy of the board with the active and ghost pieces drawn in, showing
   * the visible rows plus `bufferLines` rows of the hidden area.
   */
  getPlayfield(bufferLines = 0): Board {
    const hidden = this.board.height - this.height;
    if (
      !Number.isInteger(bufferLines) ||
      bufferLines < 0 ||
      bufferLines > hidden
    ) {
      throw new RangeError(
        `bufferLines must be an integer in 0..${hidden}, not ${bufferLines}`,
      );
    }

    const board = this.board.copy();
    const { piece, rs } = this;
    let ghostX = piece.x;
    while (!rs.overlapsAt(piece.minos, ghostX + 1, piece.y)) ghostX++;

    // cells off the board are skipped, not wrapped
    const draw = (row: number, col: number, code: number) => {
      if (row >= 0 && row < board.height && col >= 0 && col < board.width) {
        board.set(row, col, code);
      }
    };
    for (const [x, y] of piece.minos) {
      draw(ghostX + x, piece.y + y, Mino.GHOST);
    }
    for (const [x, y] of piece.minos) {
      draw(piece.x + x, piece.y + y, minoOf(piece.kind));
    }
    return board.slice(hidden - bufferLines);
  }

  /** Restart from an empty board, rebuilding every part; rules are kept. */
  reset(): void {
    const slots = ['gravity', 'queue', 'rotationSystem', 'scorer'] as const;
    for (const key of slots) {
      const factory = this.parts[key];
      if (factory !== this.built[key] && factory.ruleOverrides) {
        this.rules.override(factory.ruleOverrides);
      }
    }

    // carry sub-rule values over to the new part instances
    const carried = new Map<string, unknown>();
    for (const part of this.engineParts()) {
      if (!part.rules?.name) continue;
      for (const [name, value] of this.rules.unregister(part.rules.name)) {
        carried.set(name, value);
      }
    }

    this.board.fill(Mino.EMPTY);
    this.built = { ...this.parts };
    this.gravity = this.parts.gravity.fromGame(this);
    this.queue = this.parts.queue.fromGame(this);
    this.rs = this.parts.rotationSystem.fromGame(this);
    this.scorer = this.parts.scorer.fromGame(this);

    for (const part of this.engineParts()) {
      if (part.rules) this.rules.register(part.rules);
    }
    for (const [name, value] of carried) {
      if (this.rules.has(name)) this.rules.set(name, value);
    }

    this.queue.size = this.rules.int('queueSize');
    this.piece = this.rs.spawn(this.queue.pop());
    this.status = this.rs.overlaps(this.piece) ? 'stopped' : 'playing';
    this.delta = null;
    this.hold = null;
    this.holdLock = false;
  }

  /** Toggle pausing, or set it when `state` is given. No-op once lost. */
  pause(state?: boolean): void {
    if (this.lost) return;
    this.status = (state ?? this.playing) ? 'idle' : 'playing';
  }

  push(move: Move): void {
    if (this.status !== 'playing') return;

    const acted = this.piece;
    const delta: MoveDelta = {
      kind: move.kind,
      auto: move.auto,
      rx: move.x,
      ry: move.y,
      rr: move.r,
      x: 0,
      y: 0,
      r: 0,
      clears: [],
      piece: acted,
      board: this.board,
    };
    this.delta = delta;
    let refused = false;

    switch (move.kind) {
      case 'drag':
        this.shift(delta, 0, move.y);
        break;
      case 'softDrop':
        this.shift(delta, move.x, 0);
        break;
      case 'rotate':
        this.turn(delta, move.r);
        break;
      case 'swap':
        this.swapHold();
        break;
      case 'hardDrop':
        if (move.auto || this.rules.boolean('canHardDrop')) this.lock(delta);
        else refused = true;
        break;
      default: {
        const kind: never = move.kind;
        throw new TypeError(`unknown move kind: ${String(kind)}`);
      }
    }

    delta.piece = { ...acted };

    this.queue.size = this.rules.int('queueSize');
    this.queue.ensure();
    // a refused hard drop changes nothing, so neither part may see it
    if (refused) return;
    this.scorer.judge(delta);
    if (!move.auto) this.apply(this.gravity.calculate(delta));
  }

  /** Let gravity act; call this from the embedding application's loop. */
  tick(): void {
    this.apply(this.gravity.calculate());
  }

  private apply(move: Move | null): void {
    if (move) this.push(move);
  }

  // one cell at a time, stopping at the first blocked step
  private shift(delta: MoveDelta, dx: number, dy: number): void {
    const piece = this.piece;
    const sx = Math.sign(dx);
    for (let i = 0; i < Math.abs(dx); i++) {
      if (this.rs.overlapsAt(piece.minos, piece.x + sx, piece.y)) break;
      piece.x += sx;
      delta.x += sx;
    }
    const sy = Math.sign(dy);
    for (let i = 0; i < Math.abs(dy); i++) {
      if (this.rs.overlapsAt(piece.minos, piece.x, piece.y + sy)) break;
      piece.y += sy;
      delta.y += sy;
    }
  }

  private turn(delta: MoveDelta, turns: number): void {
    const t = ((turns % 4) + 4) % 4;
    if (t === 2 && !this.rules.boolean('can180Spin')) return;

    const piece = this.piece;
    const { x, y, r } = piece;
    if (!this.rs.rotate(piece, t)) return;
    assert(!this.rs.overlaps(piece), 'rotation left the piece overlapping');

    delta.x = piece.x - x;
    delta.y = piece.y - y;
    // applied turns keep the sign of the request
    const applied = (((piece.r - r) % 4) + 4) % 4;
    delta.r = turns < 0 && applied !== 0 ? applied - 4 : applied;
  }

  private swapHold(): void {
    if (this.holdLock) return;

    const next = this.hold ?? this.queue.pop();
    this.hold = this.piece.kind;
    this.piece = this.rs.spawn(next);
    this.holdLock = true;

    if (this.rs.overlaps(this.piece)) this.lose();
  }

  private lock(delta: MoveDelta): void {
    const piece = this.piece;
    while (!this.rs.overlapsAt(piece.minos, piece.x + 1, piece.y)) {
      piece.x++;
      delta.x++;
    }

    const code = minoOf(piece.kind);
    for (const [x, y] of piece.minos) {
      this.board.set(piece.x + x, piece.y + y, code);
    }

    // lock-out: nothing of the piece made it into the visible rows
    const hidden = this.board.height - this.height;
    if (piece.minos.every(([x]) => piece.x + x < hidden)) this.lose();

    for (let i = 0; i < this.board.height; i++) {
      if (this.board.isRowFull(i)) {
        this.board.clearRow(i);
        delta.clears.push(i);
      }
    }

    this.piece = this.rs.spawn(this.queue.pop());
    // block-out
    if (this.rs.overlaps(this.piece)) this.lose();

    this.holdLock = false;
  }

  private lose(): void {
    this.status = 'stopped';
  }

  drag(tiles: number): void {
    this.push(Move.drag(tiles));
  }

  left(tiles = 1): void {
    this.push(Move.left(tiles));
  }

  right(tiles = 1): void {
    this.push(Move.right(tiles));
  }

  rotate(turns = 1): void {
    this.push(Move.rotate(turns));
  }

  hardDrop(): void {
    this.push(Move.hardDrop());
  }

  softDrop(tiles = 1): void {
    this.push(Move.softDrop(tiles));
  }

  swap(): void {
    this.push(Move.swap());
  }

  toString(): string {
    return this.playfield.toString();
  }
}
