import { pickIndex, toCumulative } from '../graph/cumulative';
import type { RandomSource } from '../random/index';

export interface LengthRange {
  min: number;
  max: number;
}

export const DEFAULT_CLASS_LENGTH: Readonly<LengthRange> = Object.freeze({ min: 3, max: 4 });

export interface CompiledClass {
  readonly symbols: readonly string[];
  readonly cumulative: readonly number[];
}

/** Read side of the sampler, the only part a compiled grammar exposes. */
export interface ClassSampler {
  readonly lengthRange: Readonly<LengthRange>;
  has(pattern: string): boolean;
  sample(pattern: string, random: RandomSource): string;
}

// Rough English letter frequency tiers.
const LETTER_WEIGHTS: Readonly<Record<string, number>> = (() => {
  const tiers: Array<[string, number]> = [
    ['e', 12],
    ['aio', 9],
    ['nrtsl', 6],
    ['cdmupbg', 4],
    ['fhvkwy', 3],
    ['jxqz', 1],
  ];
  const table: Record<string, number> = {};
  for (const [letters, weight] of tiers) {
    for (const letter of letters) table[letter] = weight;
  }
  return table;
})();

const DIGIT_WEIGHT = 3;
const UNDERSCORE_WEIGHT = 5;
const OTHER_WEIGHT = 1;

export function symbolWeight(symbol: string): number {
  const lower = LETTER_WEIGHTS[symbol];
  if (lower !== undefined) return lower;
  if (/^[A-Z]$/.test(symbol)) {
    return (LETTER_WEIGHTS[symbol.toLowerCase()] ?? OTHER_WEIGHT * 2) / 2;
  }
  if (/^[0-9]$/.test(symbol)) return DIGIT_WEIGHT;
  if (symbol === '_') return UNDERSCORE_WEIGHT;
  return OTHER_WEIGHT;
}

/**
 * Expand `a-z0-9_` style class text into its symbols, in order. A range whose
 * end precedes its start contributes nothing.
 */
export function expandClass(pattern: string): string[] {
  const chars = Array.from(pattern);
  const symbols: string[] = [];
  let i = 0;
  while (i < chars.length) {
    if (i + 2 < chars.length && chars[i + 1] === '-') {
      const from = chars[i].codePointAt(0) ?? 0;
      const to = chars[i + 2].codePointAt(0) ?? 0;
      for (let code = from; code <= to; code++) {
        symbols.push(String.fromCodePoint(code));
      }
      i += 3;
    } else {
      symbols.push(chars[i]);
      i += 1;
    }
  }
  return symbols;
}

/**
 * Compiles character classes into weighted alphabets and draws short strings
 * from them. Compiled classes are memoized by their raw text.
 */
export class CharClassSampler implements ClassSampler {
  public readonly lengthRange: Readonly<LengthRange>;
  private readonly cache = new Map<string, CompiledClass>();

  constructor(lengthRange: LengthRange = DEFAULT_CLASS_LENGTH) {
    if (!Number.isInteger(lengthRange.min) || !Number.isInteger(lengthRange.max) || lengthRange.min < 0 || lengthRange.max < lengthRange.min) {
      throw new RangeError(`Invalid class length range ${lengthRange.min}-${lengthRange.max}`);
    }
    this.lengthRange = Object.freeze({ ...lengthRange });
  }

  compile(pattern: string): CompiledClass {
    const cached = this.cache.get(pattern);
    if (cached) return cached;

    const symbols = expandClass(pattern);
    const { cumulative } = toCumulative(symbols.map(symbolWeight));
    const compiled: CompiledClass = Object.freeze({
      symbols: Object.freeze(symbols),
      cumulative: Object.freeze(cumulative),
    });
    this.cache.set(pattern, compiled);
    return compiled;
  }

  has(pattern: string): boolean {
    return this.cache.has(pattern);
  }

  get size(): number {
    return this.cache.size;
  }

  sample(pattern: string, random: RandomSource): string {
    const compiled = this.cache.get(pattern);
    if (!compiled || compiled.symbols.length === 0) return '';

    const length = random.nextInt(this.lengthRange.min, this.lengthRange.max);
    let result = '';
    for (let i = 0; i < length; i++) {
      result += compiled.symbols[pickIndex(compiled.cumulative, random.next())];
    }
    return result;
  }
}
