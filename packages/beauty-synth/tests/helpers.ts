/**
 * Test doubles for the random source
 */

import type { RandomSource } from '../src/random/index.js';

/**
 * Replays a fixed list of draws, cycling when it runs out. Forks share the
 * same sequence.
 */
export class SequenceRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  next(): number {
    const value = this.values[this.index % this.values.length] ?? 0;
    this.index++;
    return value;
  }

  fork(): RandomSource {
    return this;
  }

  get draws(): number {
    return this.index;
  }
}

export function fixedRandom(value: number): SequenceRandom {
  return new SequenceRandom([value]);
}

export function utcDay(day: string): Date {
  return new Date(`${day}T00:00:00.000Z`);
}
