import { afterEach, describe, expect, it, vi } from 'vitest';
import { Game } from '../core/game';
import { Move } from '../core/moves';
import { GameRunner, ScriptedInput, type InputSource } from '../core/runner';
import { FakeClock } from './fakeClock';

class CountingInput implements InputSource {
  count = 0;

  sample(): readonly Move[] {
    this.count++;
    return [];
  }
}

function oGame(): Game {
  return new Game({ clock: new FakeClock(), queue: ['O'], seed: 1 });
}

describe('GameRunner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs whole fixed steps and carries the remainder', () => {
    const runner = new GameRunner(oGame(), { fixedStepMs: 10 });
    const input = new CountingInput();

    expect(runner.tick(25, input)).toBe(2);
    expect(runner.tick(5, input)).toBe(1);
    expect(input.count).toBe(3);
  });

  it('caps steps per tick', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const runner = new GameRunner(oGame(), {
      fixedStepMs: 10,
      maxStepsPerTick: 2,
    });
    const input = new CountingInput();

    expect(runner.tick(100, input)).toBe(2);
    expect(input.count).toBe(2);
    expect(warn).toHaveBeenCalledWith(
      '[Runner] Dropped 8 step(s) after a stall.',
    );

    // the backlog is gone
    expect(runner.tick(5, input)).toBe(0);
  });

  it('clamps long stalls', () => {
    const runner = new GameRunner(oGame(), {
      fixedStepMs: 10,
      maxElapsedMs: 30,
    });
    expect(runner.tick(1000)).toBe(3);
  });

  it('pushes scripted moves before each step', () => {
    const game = oGame();
    const runner = new GameRunner(game, { fixedStepMs: 10 });
    const input = new ScriptedInput([[Move.left()], [Move.hardDrop()]]);

    runner.runSteps(2, input);
    expect(input.done).toBe(true);
    expect(game.board.row(39).toArray()).toEqual([0, 0, 0, 4, 4, 0, 0, 0, 0, 0]);
  });

  it('runs for a duration', () => {
    const runner = new GameRunner(oGame(), { fixedStepMs: 10 });
    const input = new CountingInput();
    runner.runFor(35, input);
    expect(input.count).toBe(3);
  });

  it('runs until a condition holds', () => {
    const game = oGame();
    const runner = new GameRunner(game, { fixedStepMs: 10 });
    const input = new ScriptedInput([[], [], [Move.hardDrop()]]);

    const steps = runner.runUntil(
      (g) => g.delta?.kind === 'hardDrop',
      100,
      input,
    );
    expect(steps).toBe(3);
    expect(runner.runUntil(() => false, 5)).toBe(5);
  });

  it('rejects a non-positive step', () => {
    expect(() => new GameRunner(oGame(), { fixedStepMs: 0 })).toThrow(
      RangeError,
    );
  });
});
