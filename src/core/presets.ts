import type { EngineParts } from './engine';
import { InfinityGravity, MarathonGravity } from './gravity';
import { NesQueue, SevenBag } from './queue';
import { NoKicks, SRS, TetrioSRS } from './rotation';
import { GuidelineScorer, NesScorer } from './scorer';

export const Modern: Readonly<EngineParts> = {
  gravity: InfinityGravity,
  queue: SevenBag,
  rotationSystem: SRS,
  scorer: GuidelineScorer,
};

export const Tetrio: Readonly<EngineParts> = {
  ...Modern,
  rotationSystem: TetrioSRS,
};

export const Classic: Readonly<EngineParts> = {
  gravity: MarathonGravity,
  queue: NesQueue,
  rotationSystem: NoKicks,
  scorer: NesScorer,
};

export const PRESETS = {
  modern: Modern,
  tetrio: Tetrio,
  classic: Classic,
} as const;

export type PresetName = keyof typeof PRESETS;

export function isPresetName(v: unknown): v is PresetName {
  return typeof v === 'string' && Object.hasOwn(PRESETS, v);
}
