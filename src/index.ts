export { Board, BoardRow } from './core/board';
export * from './core/constants';
export { decode, decodeString, encode, encodeString } from './core/encoder';
export type { DecodedBoard, EncodedPiece } from './core/encoder';
export { partFactories } from './core/engine';
export type {
  EngineParts,
  EnginePart,
  GameView,
  GravityFactory,
  QueueFactory,
  RotationSystemFactory,
  ScorerFactory,
} from './core/engine';
export { Game } from './core/game';
export type { GameOptions } from './core/game';
export {
  Gravity,
  InfinityGravity,
  MarathonGravity,
  Timer,
  dropDelayMs,
} from './core/gravity';
export { Move, makeMove } from './core/moves';
export type { MoveDelta } from './core/moves';
export { Classic, Modern, PRESETS, Tetrio, isPresetName } from './core/presets';
export type { PresetName } from './core/presets';
export { Chaotic, NesQueue, Queue, SevenBag } from './core/queue';
export { XorShift32, randomSeed, seedToU32, shuffleInPlace } from './core/rng';
export { NoKicks, RotationSystem, SRS, TetrioSRS } from './core/rotation';
export { Rule, Ruleset } from './core/rules';
export type {
  BoardSize,
  RuleOverrides,
  RuleType,
  RuleValue,
} from './core/rules';
export { GameRunner, NullInputSource, ScriptedInput } from './core/runner';
export type { GameRunnerOptions, InputSource } from './core/runner';
export {
  GuidelineScorer,
  NesScorer,
  Scorer,
  detectTSpin,
  isPerfectClear,
} from './core/scorer';
export type { SpinKind } from './core/scorer';
export {
  DEFAULT_SETTINGS,
  gameOptionsFromSettings,
  mergeSettings,
} from './core/settings';
export type {
  GameSettings,
  GravitySettings,
  RunnerSettings,
  Settings,
  SettingsPatch,
} from './core/settings';
export {
  SRS_I_KICKS,
  SRS_KICKS,
  SRS_SHAPES,
  TETRIO_180_KICKS,
  extendKicks,
  getKickTests,
} from './core/srs';
export type { KickTable, ShapeTable } from './core/srs';
export {
  Mino,
  MonotonicClock,
  PIECES,
  isPieceKind,
  kindOf,
  minoOf,
  rotAdd,
} from './core/types';
export type {
  Clock,
  Minos,
  MoveKind,
  Piece,
  PieceKind,
  PlayingStatus,
  Rotation,
  Seed,
  Vec2,
} from './core/types';
