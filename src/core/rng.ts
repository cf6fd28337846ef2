import { randomBytes } from 'node:crypto';
import type { Seed } from './types';

export class XorShift32 {
  private s: number;

  constructor(seed: number) {
    // avoid zero state
    this.s = seed | 0 || 0x12345678;
  }

  nextU32(): number {
    // xorshift32
    let x = this.s | 0;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x | 0;
    return this.s >>> 0;
  }

  nextInt(maxExclusive: number): number {
    return this.nextU32() % maxExclusive;
  }

  clone(): XorShift32 {
    return new XorShift32(this.s);
  }
}

export function shuffleInPlace<T>(arr: T[], rng: XorShift32): void {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

/** 32-bit FNV-1a over the seed's bytes (strings are UTF-8 encoded). */
function fnv1a(bytes: Uint8Array): number {
  let h = 0x811c9dc5;
  for (const b of bytes) {
    h ^= b;
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function seedToU32(seed: Seed): number {
  if (typeof seed === 'number') {
    if (Number.isSafeInteger(seed)) return seed >>> 0;
    return fnv1a(new TextEncoder().encode(String(seed)));
  }
  if (typeof seed === 'string') return fnv1a(new TextEncoder().encode(seed));
  return fnv1a(seed);
}

export function randomSeed(): number {
  return randomBytes(4).readUInt32LE(0);
}
