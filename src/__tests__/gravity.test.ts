import { describe, expect, it } from 'vitest';
import { MIN_DROP_DELAY_MS } from '../core/constants';
import { Game } from '../core/game';
import { InfinityGravity, Timer, dropDelayMs } from '../core/gravity';
import { Classic } from '../core/presets';
import type { RuleOverrides } from '../core/rules';
import { Mino } from '../core/types';
import { FakeClock } from './fakeClock';

function oGame(clock: FakeClock, ruleOverrides: RuleOverrides = {}): Game {
  return new Game({ clock, queue: ['O'], seed: 1, ruleOverrides });
}

describe('dropDelayMs', () => {
  it('follows the guideline curve', () => {
    expect(dropDelayMs(1)).toBe(1000);
    expect(dropDelayMs(2)).toBeCloseTo(793, 6);
    expect(dropDelayMs(3)).toBeCloseTo(0.786 ** 2 * 1000, 6);
  });

  it('never drops faster than the floor', () => {
    expect(dropDelayMs(20)).toBe(MIN_DROP_DELAY_MS);
    expect(dropDelayMs(200)).toBe(MIN_DROP_DELAY_MS);
  });
});

describe('Timer', () => {
  it('is done once its duration has elapsed', () => {
    const clock = new FakeClock(100);
    const timer = new Timer(clock);
    expect(timer.running).toBe(false);
    expect(timer.done).toBe(false);

    timer.start(50);
    clock.advance(49);
    expect(timer.done).toBe(false);
    clock.advance(1);
    expect(timer.done).toBe(true);

    timer.stop();
    expect(timer.running).toBe(false);
    expect(timer.done).toBe(false);
  });
});

describe('InfinityGravity', () => {
  it('drops the piece one row per drop delay', () => {
    const clock = new FakeClock();
    const game = oGame(clock);
    expect(game.gravity).toBeInstanceOf(InfinityGravity);

    clock.t = 999;
    game.tick();
    expect(game.piece.x).toBe(18);
    expect(game.delta).toBeNull();

    clock.t = 1000;
    game.tick();
    expect(game.piece.x).toBe(19);
    expect(game.delta?.kind).toBe('softDrop');
    expect(game.delta?.auto).toBe(true);
    // gravity earns no points
    expect(game.score).toBe(0);

    clock.t = 3500;
    game.tick();
    expect(game.piece.x).toBe(21);
  });

  it('locks a grounded piece after the lock delay', () => {
    const clock = new FakeClock();
    const game = oGame(clock);

    game.softDrop(30);
    expect(game.piece.x).toBe(38);
    expect(game.delta?.x).toBe(20);
    expect(game.score).toBe(20);

    clock.t = 499;
    game.tick();
    expect(game.board.get(39, 4)).toBe(Mino.EMPTY);

    clock.t = 500;
    game.tick();
    expect(game.delta?.kind).toBe('hardDrop');
    expect(game.delta?.auto).toBe(true);
    expect(game.board.get(38, 4)).toBe(Mino.O);
    expect(game.board.get(39, 5)).toBe(Mino.O);
    expect(game.score).toBe(20);
  });

  it('restarts the lock delay when a grounded piece moves', () => {
    const clock = new FakeClock();
    const game = oGame(clock);
    game.softDrop(30);

    clock.t = 400;
    game.left();
    expect(game.gravity).toBeInstanceOf(InfinityGravity);
    if (!(game.gravity instanceof InfinityGravity)) return;
    expect(game.gravity.resets).toBe(1);

    clock.t = 899;
    game.tick();
    expect(game.board.row(39).toArray()).toEqual(Array(10).fill(0));

    clock.t = 900;
    game.tick();
    expect(game.board.row(39).toArray()).toEqual([0, 0, 0, 4, 4, 0, 0, 0, 0, 0]);
  });

  it('locks at once when the reset cap is reached', () => {
    const clock = new FakeClock();
    const game = oGame(clock, { 'gravity.lockResets': 2 });
    game.softDrop(30);

    clock.t = 100;
    game.left();
    expect(game.board.get(39, 3)).toBe(Mino.EMPTY);

    clock.t = 200;
    game.right();
    expect(game.delta?.kind).toBe('hardDrop');
    expect(game.board.row(39).toArray()).toEqual([0, 0, 0, 0, 4, 4, 0, 0, 0, 0]);
  });

  it('takes its lock delay from the rules', () => {
    const clock = new FakeClock();
    const game = oGame(clock, { 'gravity.lockDelayMs': 100 });
    game.softDrop(30);

    clock.t = 100;
    game.tick();
    expect(game.board.get(39, 4)).toBe(Mino.O);
  });
});

describe('MarathonGravity', () => {
  it('forces a hard drop after the auto-lock time', () => {
    const clock = new FakeClock();
    const game = new Game({
      parts: Classic,
      clock,
      queue: ['O'],
      seed: 1,
      ruleOverrides: { 'gravity.autoLockMs': 2000 },
    });

    clock.t = 2000;
    game.tick();
    expect(game.delta?.kind).toBe('hardDrop');
    expect(game.board.row(39).toArray()).toEqual([0, 0, 0, 0, 4, 4, 0, 0, 0, 0]);
    expect(game.score).toBe(0);
  });
});
