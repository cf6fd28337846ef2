import type { Game } from './game';
import type { Move } from './moves';

export interface InputSource {
  /** Moves to push before the game ticks this step. */
  sample(game: Game, dtMs: number): readonly Move[];
}

export interface GameRunnerOptions {
  fixedStepMs: number;
  /**
   * Optional clamp to prevent spiral-of-death after long stalls.
   */
  maxElapsedMs?: number;
  /**
   * Optional cap on steps per tick. Extra accumulated time is dropped.
   */
  maxStepsPerTick?: number;
}

/**
 * Drives a game at a fixed step from a variable-rate loop (a render loop, a
 * timer). The game reads time from its own clock; the runner only decides how
 * often it is sampled.
 */
export class GameRunner {
  private accMs = 0;

  constructor(
    private readonly game: Game,
    private readonly options: GameRunnerOptions,
  ) {
    if (!(options.fixedStepMs > 0)) {
      throw new RangeError(
        `fixedStepMs must be positive, not ${options.fixedStepMs}`,
      );
    }
  }

  resetTiming(): void {
    this.accMs = 0;
  }

  /** Returns the number of steps run. */
  tick(elapsedMs: number, input: InputSource = NullInputSource): number {
    const clamped =
      this.options.maxElapsedMs == null
        ? elapsedMs
        : Math.min(elapsedMs, this.options.maxElapsedMs);

    this.accMs += clamped;
    let steps = 0;

    while (this.accMs >= this.options.fixedStepMs) {
      this.step(input);
      this.accMs -= this.options.fixedStepMs;
      steps++;
      if (
        this.options.maxStepsPerTick != null &&
        steps >= this.options.maxStepsPerTick
      ) {
        const dropped = Math.floor(this.accMs / this.options.fixedStepMs);
        if (dropped > 0) {
          console.warn(`[Runner] Dropped ${dropped} step(s) after a stall.`);
        }
        this.accMs = 0;
        break;
      }
    }
    return steps;
  }

  step(input: InputSource = NullInputSource): void {
    for (const move of input.sample(this.game, this.options.fixedStepMs)) {
      this.game.push(move);
    }
    this.game.tick();
  }

  runSteps(steps: number, input: InputSource = NullInputSource): void {
    const count = Math.max(0, Math.trunc(steps));
    for (let i = 0; i < count; i++) this.step(input);
  }

  runFor(ms: number, input: InputSource = NullInputSource): void {
    const steps = Math.floor(ms / this.options.fixedStepMs);
    this.runSteps(steps, input);
  }

  /** Step until `predicate` holds; returns the number of steps run. */
  runUntil(
    predicate: (game: Game) => boolean,
    maxSteps: number | undefined,
    input: InputSource = NullInputSource,
  ): number {
    const limit = maxSteps == null ? Infinity : Math.max(0, maxSteps);
    let steps = 0;
    while (!predicate(this.game) && steps < limit) {
      this.step(input);
      steps++;
    }
    return steps;
  }
}

export const NullInputSource: InputSource = {
  sample: () => [],
};

/** Replays a fixed script: one entry of moves per step, then nothing. */
export class ScriptedInput implements InputSource {
  private index = 0;

  constructor(private readonly script: readonly (readonly Move[])[]) {}

  sample(): readonly Move[] {
    return this.script[this.index++] ?? [];
  }

  get done(): boolean {
    return this.index >= this.script.length;
  }
}
