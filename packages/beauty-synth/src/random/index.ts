/**
 * Injectable randomness for the generators
 *
 * Every draw goes through a {@link RandomSource}. A seeded source makes a
 * dataset reproducible; `fork()` hands each brand and each generator its
 * own stream so they never share generator state.
 */

import { ValidationError } from '../types.js';

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Independent stream derived from this one and a label */
  fork(label: string): RandomSource;
}

/**
 * 53-bit string hash (cyrb53), used to turn seeds and fork labels into
 * 32-bit PRNG states
 */
export function hashSeed(input: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;
  for (let i = 0; i < input.length; i++) {
    const ch = input.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507) ^ Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507) ^ Math.imul(h1 ^ (h1 >>> 13), 3266489909);
  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/**
 * Deterministic source (Mulberry32)
 */
export class SeededRandom implements RandomSource {
  private state: number;
  private readonly seed: string;

  constructor(seed: string | number) {
    this.seed = String(seed);
    this.state = hashSeed(this.seed) >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  fork(label: string): RandomSource {
    return new SeededRandom(`${this.seed}/${label}`);
  }
}

/**
 * Process-wide Math.random; forks are just more of the same
 */
export class MathRandom implements RandomSource {
  next(): number {
    return Math.random();
  }

  fork(): RandomSource {
    return new MathRandom();
  }
}

export function createRandom(seed?: string | number): RandomSource {
  return seed === undefined ? new MathRandom() : new SeededRandom(seed);
}

// Numeric helpers

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// Sampling

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/**
 * Integer in [min, max], both ends included
 */
export function uniformInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min + 1)) + min;
}

/**
 * Box-Muller transform
 */
export function normal(random: RandomSource, mean: number, stdDev: number): number {
  // 1 - u keeps the log argument in (0, 1]
  const u1 = 1 - random.next();
  const u2 = random.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

export function exponential(random: RandomSource, mean: number): number {
  return -mean * Math.log(1 - random.next());
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(random.next() * items.length)];
  if (item === undefined) {
    throw new ValidationError('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Draw one item with probability proportional to its weight
 */
export function weightedPick<T>(random: RandomSource, items: readonly T[], weights: readonly number[]): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new ValidationError('Weighted pick needs one weight per item', {
      items: items.length,
      weights: weights.length
    });
  }

  const total = weights.reduce((sum, w) => sum + w, 0);
  let threshold = random.next() * total;
  // Float drift can leave a sliver past the last bucket
  let lastWeighted: { item: T } | undefined;

  for (const [i, item] of items.entries()) {
    const weight = weights[i] ?? 0;
    if (weight > 0) lastWeighted = { item };
    threshold -= weight;
    if (threshold < 0) {
      return item;
    }
  }

  if (!lastWeighted) {
    throw new ValidationError('Weighted pick needs at least one positive weight', { weights });
  }
  return lastWeighted.item;
}

/**
 * `count` draws with replacement
 */
export function sampleWithReplacement<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  if (items.length === 0) return [];
  return Array.from({ length: count }, () => pick(random, items));
}
