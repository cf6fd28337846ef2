import { afterEach, describe, expect, it, vi } from 'vitest';
import { Rule, Ruleset } from '../core/rules';

function core(): Ruleset {
  return new Ruleset(null, [
    new Rule('boardSize', 'size', [20, 10]),
    new Rule('queueSize', 'int', 4),
    new Rule('seed', 'seed', null),
    new Rule('canHardDrop', 'boolean', true),
  ]);
}

describe('Rule', () => {
  it('validates its default', () => {
    expect(() => new Rule('level', 'int', 1.5)).toThrow(TypeError);
  });

  it('validates assignments and resets to the default', () => {
    const rule = new Rule('queueSize', 'int', 4);
    rule.assign(6);
    expect(rule.value).toBe(6);
    expect(() => rule.assign('6')).toThrow(
      '"6" has incompatible type for rule queueSize (int)',
    );
    expect(rule.value).toBe(6);
    rule.reset();
    expect(rule.value).toBe(4);
  });

  it('accepts every seed shape', () => {
    const rule = new Rule('seed', 'seed', null);
    for (const seed of [7, 'abc', new Uint8Array([1, 2]), null]) {
      rule.assign(seed);
      expect(rule.value).toBe(seed);
    }
    expect(() => rule.assign(1.5)).toThrow(TypeError);
    expect(() => rule.assign(true)).toThrow(TypeError);
  });

  it('only takes positive integer pairs as sizes', () => {
    const rule = new Rule('boardSize', 'size', [20, 10]);
    expect(() => rule.assign([20])).toThrow(TypeError);
    expect(() => rule.assign([0, 10])).toThrow(TypeError);
    expect(() => rule.assign([20, 10.5])).toThrow(TypeError);
    rule.assign([8, 4]);
    expect(rule.value).toEqual([8, 4]);
  });
});

describe('Ruleset', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads rules through typed getters', () => {
    const rules = core();
    expect(rules.size('boardSize')).toEqual([20, 10]);
    expect(rules.int('queueSize')).toBe(4);
    expect(rules.boolean('canHardDrop')).toBe(true);
    expect(rules.seed('seed')).toBeNull();
    expect(() => rules.boolean('queueSize')).toThrow(
      'rule queueSize is not of type boolean',
    );
    expect(() => rules.get('nope')).toThrow('no such rule: nope');
  });

  it('rejects duplicate and malformed names', () => {
    expect(
      () =>
        new Ruleset(null, [new Rule('a', 'int', 1), new Rule('a', 'int', 2)]),
    ).toThrow('duplicate rule name: a');
    expect(() => new Ruleset(null, [new Rule('a b', 'int', 1)])).toThrow(
      'invalid rule name: "a b"',
    );
  });

  it('registers sub-rulesets under their name', () => {
    const rules = core();
    const gravity = new Ruleset('gravity', [
      new Rule('lockDelayMs', 'number', 500),
    ]);
    rules.register(gravity);

    expect(rules.has('gravity.lockDelayMs')).toBe(true);
    expect(rules.names()).toEqual([
      'boardSize',
      'queueSize',
      'seed',
      'canHardDrop',
      'gravity.lockDelayMs',
    ]);

    // both sides share the rule
    rules.set('gravity.lockDelayMs', 300);
    expect(gravity.number('lockDelayMs')).toBe(300);
  });

  it('refuses unnamed or colliding sub-rulesets', () => {
    const rules = core();
    expect(() => rules.register(new Ruleset(null))).toThrow(
      'attempted registering an unnamed ruleset',
    );

    rules.register(new Ruleset('gravity', [new Rule('x', 'int', 1)]));
    expect(() =>
      rules.register(new Ruleset('gravity', [new Rule('x', 'int', 2)])),
    ).toThrow('conflicting rule names: gravity.x');
  });

  it('applies overrides and warns about unknown names', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const rules = core();
    rules.override({ queueSize: 6, nope: 1 });

    expect(rules.int('queueSize')).toBe(6);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[Ruleset] Ignoring override for unknown rule "nope".',
    );
  });

  it('fails on overrides of the wrong type', () => {
    const rules = core();
    expect(() => rules.override({ canHardDrop: 'yes' })).toThrow(TypeError);
  });

  it('unregisters a sub-ruleset, returning its values', () => {
    const rules = core();
    rules.register(
      new Ruleset('gravity', [
        new Rule('lockDelayMs', 'number', 500),
        new Rule('lockResets', 'int', 15),
      ]),
    );
    rules.set('gravity.lockResets', 3);

    const removed = rules.unregister('gravity');
    expect([...removed]).toEqual([
      ['gravity.lockDelayMs', 500],
      ['gravity.lockResets', 3],
    ]);
    expect(rules.has('gravity.lockResets')).toBe(false);
    expect(rules.has('queueSize')).toBe(true);
  });

  it('serializes current values', () => {
    const rules = core();
    rules.set('seed', 'abc');
    expect(rules.toJSON()).toEqual({
      boardSize: [20, 10],
      queueSize: 4,
      seed: 'abc',
      canHardDrop: true,
    });
  });
});
