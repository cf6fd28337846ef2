import { QUEUE_SIZE } from './constants';
import type { EnginePart, GameView } from './engine';
import { XorShift32, randomSeed, seedToU32, shuffleInPlace } from './rng';
import type { Ruleset } from './rules';
import { PIECES, type PieceKind, type Seed } from './types';

type QueueClass = new (
  pieces?: readonly PieceKind[],
  seed?: Seed | null,
  size?: number,
) => Queue;

/**
 * Upcoming pieces. Subclasses only decide how the buffer grows (`fill`); the
 * base keeps at least `size` pieces drawn ahead so the preview window is
 * always full.
 */
export abstract class Queue implements EnginePart, Iterable<PieceKind> {
  readonly rules: Ruleset | null = null;
  readonly seed: Seed;

  protected readonly rng: XorShift32;
  protected readonly pieces: PieceKind[];
  private windowSize: number;

  constructor(
    pieces: readonly PieceKind[] = [],
    seed: Seed | null = null,
    size = QUEUE_SIZE,
  ) {
    this.seed = seed ?? randomSeed();
    this.rng = new XorShift32(seedToU32(this.seed));
    this.pieces = [...pieces];
    this.windowSize = Queue.checkSize(size);
  }

  static fromGame(
    this: QueueClass,
    game: GameView,
    pieces?: readonly PieceKind[],
  ): Queue {
    const { rules } = game;
    return new this(pieces, rules.seed('seed'), rules.int('queueSize'));
  }

  private static checkSize(size: number): number {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`queue size must be a non-negative integer: ${size}`);
    }
    return size;
  }

  /** Append at least one piece to `pieces`. */
  protected abstract fill(): void;

  get size(): number {
    return this.windowSize;
  }

  set size(size: number) {
    this.windowSize = Queue.checkSize(size);
  }

  get length(): number {
    return this.windowSize;
  }

  /** Top up the buffer so a pop still leaves a full window. */
  ensure(): void {
    this.growTo(this.windowSize + 1);
  }

  private growTo(n: number): void {
    while (this.pieces.length < n) {
      const before = this.pieces.length;
      this.fill();
      if (this.pieces.length <= before) {
        throw new Error(
          `${this.constructor.name}.fill() did not grow the queue`,
        );
      }
    }
  }

  pop(): PieceKind {
    this.ensure();
    const next = this.pieces.shift();
    if (next === undefined) throw new Error('queue is empty after fill');
    return next;
  }

  /** The next `n` pieces, drawing more if needed. Does not consume. */
  peek(n: number): PieceKind[] {
    this.growTo(n);
    return this.pieces.slice(0, n);
  }

  at(index: number): PieceKind | undefined {
    return this.toArray().at(index);
  }

  toArray(): PieceKind[] {
    this.ensure();
    return this.pieces.slice(0, this.windowSize);
  }

  [Symbol.iterator](): Iterator<PieceKind> {
    return this.toArray()[Symbol.iterator]();
  }

  toString(): string {
    return `${this.constructor.name}(${this.toArray().join(', ')})`;
  }
}

/**
 * The guideline "Random Generator": each group of seven pieces is a shuffled
 * permutation of all seven kinds.
 */
export class SevenBag extends Queue {
  protected fill(): void {
    const bag = [...PIECES];
    shuffleInPlace(bag, this.rng);
    this.pieces.push(...bag);
  }
}

/** Uniform draws with replacement; no protection against droughts. */
export class Chaotic extends Queue {
  protected fill(): void {
    this.pieces.push(PIECES[this.rng.nextInt(PIECES.length)]);
  }
}

/**
 * Classic console randomizer: a uniform draw, rerolled once if it repeats the
 * previous piece.
 */
export class NesQueue extends Queue {
  private last: PieceKind | null = null;

  protected fill(): void {
    let next = this.draw();
    if (next === this.last) next = this.draw();
    this.last = next;
    this.pieces.push(next);
  }

  private draw(): PieceKind {
    return PIECES[this.rng.nextInt(PIECES.length)];
  }
}
