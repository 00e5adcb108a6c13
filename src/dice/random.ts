import crypto from 'crypto';
import type { RandomSource } from './types';

/**
 * Randomness sources
 *
 * Evaluation takes its entropy as an explicit `RandomSource` so a run can
 * be replayed. Three production sources are provided:
 * - `math`: `Math.random`
 * - `crypto`: Node's `crypto.randomInt`
 * - `mulberry32`: a small seeded PRNG, deterministic for a given seed
 *
 * `scriptedSource` replays a fixed list of draws and is meant for tests and
 * for reproducing a reported roll.
 *
 * @module dice/random
 */

export type RandomMethod = 'math' | 'crypto' | 'mulberry32';

export const RANDOM_METHODS: readonly RandomMethod[] = ['math', 'crypto', 'mulberry32'];

export function isRandomMethod(value: unknown): value is RandomMethod {
  return typeof value === 'string' && (RANDOM_METHODS as readonly string[]).includes(value);
}

/**
 * Adapt a `[0, 1)` float generator into an inclusive integer source.
 */
export function fromUnitInterval(next: () => number): RandomSource {
  return {
    nextInt(min: number, max: number): number {
      return Math.floor(next() * (max - min + 1)) + min;
    },
  };
}

/**
 * Seeded mulberry32 generator returning floats in `[0, 1)`.
 */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export const cryptoSource: RandomSource = {
  nextInt(min: number, max: number): number {
    return crypto.randomInt(min, max + 1);
  },
};

/**
 * Build a random source from configuration.
 *
 * @param method - Generator to use; unknown values fall back to `math`.
 * @param seed - Seed for `mulberry32`; the current time when absent.
 */
export function createRandomSource(method: RandomMethod = 'math', seed?: number | null): RandomSource {
  if (method === 'crypto') return cryptoSource;
  if (method === 'mulberry32') {
    const seedNum = seed === undefined || seed === null || !Number.isFinite(seed) ? Date.now() : seed;
    return fromUnitInterval(mulberry32(seedNum));
  }
  return fromUnitInterval(Math.random);
}

/**
 * A source that returns `draws` in order, ignoring the requested range.
 * Throws once the script runs out.
 */
export function scriptedSource(draws: readonly number[]): RandomSource & { remaining(): number } {
  let index = 0;
  return {
    nextInt(): number {
      if (index >= draws.length) throw new Error(`Scripted random source exhausted after ${index} draws`);
      return draws[index++];
    },
    remaining() {
      return draws.length - index;
    },
  };
}
