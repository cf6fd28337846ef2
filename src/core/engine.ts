import type { Board } from './board';
import type { Gravity } from './gravity';
import type { Queue } from './queue';
import type { RotationSystem } from './rotation';
import type { RuleOverrides, Ruleset } from './rules';
import type { Scorer } from './scorer';
import type { Clock, Piece, PieceKind } from './types';

/**
 * What engine parts may read from the game that owns them.
 */
export interface GameView {
  readonly board: Board;
  readonly rules: Ruleset;
  readonly piece: Piece;
  readonly level: number;
  readonly rs: RotationSystem;
  readonly clock: Clock;
}

export interface EnginePart {
  /** Rules owned by this part, registered under the ruleset's name. */
  readonly rules: Ruleset | null;
}

interface PartFactory {
  /** Rule values forced before the caller's own overrides are applied. */
  readonly ruleOverrides?: RuleOverrides;
}

export interface GravityFactory extends PartFactory {
  fromGame(game: GameView): Gravity;
}

export interface QueueFactory extends PartFactory {
  fromGame(game: GameView, pieces?: readonly PieceKind[]): Queue;
}

export interface RotationSystemFactory extends PartFactory {
  fromGame(game: GameView): RotationSystem;
}

export interface ScorerFactory extends PartFactory {
  fromGame(game: GameView, score?: number, level?: number): Scorer;
}

export interface EngineParts {
  gravity: GravityFactory;
  queue: QueueFactory;
  rotationSystem: RotationSystemFactory;
  scorer: ScorerFactory;
}

export function partFactories(
  parts: EngineParts,
): readonly PartFactory[] {
  return [parts.gravity, parts.queue, parts.rotationSystem, parts.scorer];
}
