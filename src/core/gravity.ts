import {
  DEFAULT_AUTO_LOCK_MS,
  DEFAULT_LOCK_DELAY_MS,
  DEFAULT_LOCK_RESETS,
  MIN_DROP_DELAY_MS,
} from './constants';
import type { EnginePart, GameView } from './engine';
import { makeMove, type Move, type MoveDelta } from './moves';
import { Rule, Ruleset } from './rules';
import type { Clock } from './types';

/**
 * Guideline Marathon drop delay for a level, in milliseconds:
 * `(0.8 - (level - 1) * 0.007) ^ (level - 1)` seconds.
 */
export function dropDelayMs(level: number): number {
  const base = Math.max(0, 0.8 - (level - 1) * 0.007);
  return Math.max(MIN_DROP_DELAY_MS, base ** (level - 1) * 1000);
}

export class Timer {
  private started = 0;
  private duration = 0;
  private active = false;

  constructor(private readonly clock: Clock) {}

  get running(): boolean {
    return this.active;
  }

  /** (Re)start the timer. */
  start(durationMs: number): void {
    this.started = this.clock.now();
    this.duration = durationMs;
    this.active = true;
  }

  stop(): void {
    this.started = 0;
    this.active = false;
  }

  /** True if running and the duration has elapsed. */
  get done(): boolean {
    return this.active && this.started + this.duration <= this.clock.now();
  }
}

/**
 * Decides when the active piece falls or locks on its own. `calculate` never
 * touches the game: it returns the synthetic move to push, if any, and the
 * game applies it as an `auto` move.
 */
export abstract class Gravity implements EnginePart {
  readonly rules: Ruleset | null = null;

  constructor(protected readonly game: GameView) {}

  /**
   * Called on every tick (without a delta) and after every player move.
   * Returns at most one synthetic move.
   */
  abstract calculate(delta?: MoveDelta | null): Move | null;

  protected grounded(): boolean {
    const { piece, rs } = this.game;
    return rs.overlapsAt(piece.minos, piece.x + 1, piece.y);
  }
}

/**
 * Marathon gravity with Infinity lock delay: a grounded piece locks once it
 * has rested for the lock delay, and each successful move or turn restarts
 * the delay, up to a reset cap.
 */
export class InfinityGravity extends Gravity {
  readonly rules = new Ruleset('gravity', [
    new Rule('lockDelayMs', 'number', DEFAULT_LOCK_DELAY_MS),
    new Rule('lockResets', 'int', DEFAULT_LOCK_RESETS),
  ]);

  private readonly idleLock: Timer;
  private lockResets = 0;
  private lastDrop: number;

  constructor(game: GameView) {
    super(game);
    this.idleLock = new Timer(game.clock);
    this.lastDrop = game.clock.now();
  }

  static fromGame(game: GameView): Gravity {
    return new InfinityGravity(game);
  }

  get resets(): number {
    return this.lockResets;
  }

  get locking(): boolean {
    return this.idleLock.running;
  }

  calculate(delta?: MoveDelta | null): Move | null {
    const now = this.game.clock.now();
    const lockDelay = this.rules.number('lockDelayMs');

    if (delta) {
      if (delta.kind === 'hardDrop') {
        this.idleLock.stop();
        this.lockResets = 0;
        this.lastDrop = now;
      } else if (delta.kind === 'swap') {
        this.lockResets = 0;
      } else if (this.idleLock.running && (delta.x || delta.y || delta.r)) {
        this.idleLock.start(lockDelay);
        this.lockResets++;
      }
    }

    if (this.grounded()) {
      if (!this.idleLock.running) this.idleLock.start(lockDelay);
    } else if (this.idleLock.running) {
      this.idleLock.stop();
    }

    if (
      this.idleLock.done ||
      (this.idleLock.running &&
        this.lockResets >= this.rules.int('lockResets'))
    ) {
      this.idleLock.stop();
      this.lockResets = 0;
      this.lastDrop = now;
      return makeMove('hardDrop', { auto: true });
    }

    const delay = dropDelayMs(this.game.level);
    const sinceDrop = now - this.lastDrop;
    if (sinceDrop >= delay) {
      this.lastDrop = now;
      return makeMove('softDrop', {
        x: Math.floor(sinceDrop / delay),
        auto: true,
      });
    }
    return null;
  }
}

/**
 * Marathon gravity with a fixed timer instead of lock delay: the piece is
 * forced down if no hard drop happened for `autoLockMs`.
 */
export class MarathonGravity extends Gravity {
  readonly rules = new Ruleset('gravity', [
    new Rule('autoLockMs', 'number', DEFAULT_AUTO_LOCK_MS),
  ]);

  private lastDrop: number;
  private lastHardDrop: number;

  constructor(game: GameView) {
    super(game);
    const now = game.clock.now();
    this.lastDrop = now;
    this.lastHardDrop = now;
  }

  static fromGame(game: GameView): Gravity {
    return new MarathonGravity(game);
  }

  calculate(delta?: MoveDelta | null): Move | null {
    const now = this.game.clock.now();

    if (delta?.kind === 'hardDrop') this.lastHardDrop = now;

    if (now - this.lastHardDrop >= this.rules.number('autoLockMs')) {
      this.lastHardDrop = now;
      return makeMove('hardDrop', { auto: true });
    }

    const delay = dropDelayMs(this.game.level);
    const sinceDrop = now - this.lastDrop;
    if (sinceDrop >= delay) {
      this.lastDrop = now;
      return makeMove('softDrop', {
        x: Math.floor(sinceDrop / delay),
        auto: true,
      });
    }
    return null;
  }
}
