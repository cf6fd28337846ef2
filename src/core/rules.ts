import type { Seed } from './types';

export type BoardSize = readonly [number, number];

interface RuleTypes {
  int: number;
  number: number;
  boolean: boolean;
  string: string;
  seed: Seed | null;
  size: BoardSize;
}

export type RuleType = keyof RuleTypes;
export type RuleValue = RuleTypes[RuleType];
export type RuleOverrides = Readonly<Record<string, unknown>>;

function accepts<T extends RuleType>(
  type: T,
  value: unknown,
): value is RuleTypes[T] {
  switch (type) {
    case 'int':
      return Number.isSafeInteger(value);
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
    case 'seed':
      return (
        value === null ||
        Number.isSafeInteger(value) ||
        typeof value === 'string' ||
        value instanceof Uint8Array
      );
    case 'size':
      return (
        Array.isArray(value) &&
        value.length === 2 &&
        value.every((n) => Number.isSafeInteger(n) && n > 0)
      );
    default:
      return false;
  }
}

function show(value: unknown): string {
  if (value instanceof Uint8Array) return `Uint8Array(${value.length})`;
  return JSON.stringify(value) ?? String(value);
}

/**
 * A named, typed rule value. Assigning a value of the wrong type throws.
 */
export class Rule<T extends RuleType = RuleType> {
  private current: RuleTypes[T];

  constructor(
    readonly name: string,
    readonly type: T,
    readonly defaultValue: RuleTypes[T],
  ) {
    if (!accepts(type, defaultValue)) {
      throw new TypeError(
        `default ${show(defaultValue)} has incompatible type for rule ${name} (${type})`,
      );
    }
    this.current = defaultValue;
  }

  get value(): RuleTypes[T] {
    return this.current;
  }

  assign(value: unknown): void {
    if (!accepts(this.type, value)) {
      throw new TypeError(
        `${show(value)} has incompatible type for rule ${this.name} (${this.type})`,
      );
    }
    this.current = value;
  }

  reset(): void {
    this.current = this.defaultValue;
  }
}

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Registry of rules. Engine parts contribute their own named sub-rulesets,
 * whose rules are merged in under a `name.` prefix.
 */
export class Ruleset {
  private readonly rules = new Map<string, Rule>();

  constructor(
    readonly name: string | null,
    rules: readonly Rule[] = [],
  ) {
    for (const rule of rules) {
      if (!NAME_RE.test(rule.name)) {
        throw new Error(`invalid rule name: ${JSON.stringify(rule.name)}`);
      }
      if (this.rules.has(rule.name)) {
        throw new Error(`duplicate rule name: ${rule.name}`);
      }
      this.rules.set(rule.name, rule);
    }
  }

  has(name: string): boolean {
    return this.rules.has(name);
  }

  names(): string[] {
    return [...this.rules.keys()];
  }

  private rule(name: string): Rule {
    const rule = this.rules.get(name);
    if (!rule) throw new Error(`no such rule: ${name}`);
    return rule;
  }

  get(name: string): RuleValue {
    return this.rule(name).value;
  }

  set(name: string, value: unknown): void {
    this.rule(name).assign(value);
  }

  int(name: string): number {
    const value = this.get(name);
    if (typeof value !== 'number') throw this.mismatch(name, 'int');
    return value;
  }

  number(name: string): number {
    const value = this.get(name);
    if (typeof value !== 'number') throw this.mismatch(name, 'number');
    return value;
  }

  boolean(name: string): boolean {
    const value = this.get(name);
    if (typeof value !== 'boolean') throw this.mismatch(name, 'boolean');
    return value;
  }

  size(name: string): BoardSize {
    const value = this.get(name);
    if (
      typeof value !== 'object' ||
      value === null ||
      value instanceof Uint8Array
    ) {
      throw this.mismatch(name, 'size');
    }
    return value;
  }

  seed(name: string): Seed | null {
    const value = this.get(name);
    if (
      value === null ||
      typeof value === 'number' ||
      typeof value === 'string' ||
      value instanceof Uint8Array
    ) {
      return value;
    }
    throw this.mismatch(name, 'seed');
  }

  private mismatch(name: string, type: RuleType): TypeError {
    return new TypeError(`rule ${name} is not of type ${type}`);
  }

  /** Apply overrides; names without a matching rule are skipped. */
  override(overrides: RuleOverrides): void {
    for (const [name, value] of Object.entries(overrides)) {
      const rule = this.rules.get(name);
      if (!rule) {
        console.warn(`[Ruleset] Ignoring override for unknown rule "${name}".`);
        continue;
      }
      rule.assign(value);
    }
  }

  /** Merge a named sub-ruleset, prefixing its rule names with `name.`. */
  register(ruleset: Ruleset): void {
    if (!ruleset.name) {
      throw new Error('attempted registering an unnamed ruleset');
    }
    const prefix = `${ruleset.name}.`;
    for (const rule of ruleset.rules.values()) {
      const name = prefix + rule.name;
      if (this.rules.has(name)) {
        throw new Error(`conflicting rule names: ${name}`);
      }
      this.rules.set(name, rule);
    }
  }

  /**
   * Remove every rule registered under `name.`; returns their current values
   * keyed by full name.
   */
  unregister(name: string): Map<string, RuleValue> {
    const prefix = `${name}.`;
    const removed = new Map<string, RuleValue>();
    for (const [key, rule] of [...this.rules]) {
      if (!key.startsWith(prefix)) continue;
      removed.set(key, rule.value);
      this.rules.delete(key);
    }
    return removed;
  }

  toJSON(): Record<string, RuleValue> {
    const out: Record<string, RuleValue> = {};
    for (const [name, rule] of this.rules) out[name] = rule.value;
    return out;
  }
}
