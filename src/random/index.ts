import { randomBytes } from 'node:crypto';
import { GenerationError } from '../walker/index';

/**
 * Source of uniform randomness consumed by the walker and the class sampler.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], inclusive. Returns `min` when `max < min`. */
  nextInt(min: number, max: number): number;
}

const MASK_64 = (1n << 64n) - 1n;
const TWO_POW_53 = 2 ** 53;

function mulU64(a: bigint, b: bigint): bigint {
  return (a * b) & MASK_64;
}

/**
 * SplitMix64 finalizer. Used to scramble user seeds so that small, adjacent
 * seeds (1, 2, 3...) start from unrelated xorshift states.
 */
function splitmix64Mix(z: bigint): bigint {
  z = (z + 0x9e3779b97f4a7c15n) & MASK_64;
  z = mulU64(z ^ (z >> 30n), 0xbf58476d1ce4e5b9n);
  z = mulU64(z ^ (z >> 27n), 0x94d049bb133111ebn);
  return z ^ (z >> 31n);
}

function entropySeed(): bigint {
  let seed = 0n;
  while (seed === 0n) {
    seed = randomBytes(8).readBigUInt64BE(0);
  }
  return seed;
}

export type SeedInput = number | bigint;

function toU64(seed: SeedInput): bigint {
  if (typeof seed === 'number' && !Number.isFinite(seed)) {
    throw new GenerationError(`Seed must be a finite number, got ${seed}`, 'invalid-seed');
  }
  const value = typeof seed === 'bigint' ? seed : BigInt(Math.trunc(seed));
  return BigInt.asUintN(64, value);
}

/**
 * Xorshift64 (13, 7, 17) generator. A zero seed draws its state from system
 * entropy; any other seed yields the same sequence every time.
 */
export class XorShiftRandom implements RandomSource {
  /** The effective 64-bit seed, after entropy substitution for zero. */
  public readonly seed: bigint;
  private state: bigint;

  constructor(seed: SeedInput = 0) {
    const requested = toU64(seed);
    this.seed = requested === 0n ? entropySeed() : requested;
    const mixed = splitmix64Mix(this.seed);
    // xorshift never leaves the all-zero state
    this.state = mixed === 0n ? 0x9e3779b97f4a7c15n : mixed;
  }

  nextU64(): bigint {
    let x = this.state;
    x ^= (x << 13n) & MASK_64;
    x ^= x >> 7n;
    x ^= (x << 17n) & MASK_64;
    this.state = x;
    return x;
  }

  next(): number {
    return Number(this.nextU64() >> 11n) / TWO_POW_53;
  }

  nextInt(min: number, max: number): number {
    if (max < min) return min;
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    if (hi < lo) return min;
    return lo + Math.floor(this.next() * (hi - lo + 1));
  }
}

export function createRandom(seed?: SeedInput): XorShiftRandom {
  return new XorShiftRandom(seed ?? 0);
}
