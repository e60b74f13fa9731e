import fs from 'node:fs/promises';
import type { LengthRange } from './charclass/index';
import { errorMessage } from './utils/errors';

export interface GrammarwalkSettings {
  /** Weight of a term or operator with no `<p>` annotation. */
  defaultProbability: number;
  /** Inclusive length range of strings drawn from a character class. */
  classLength: LengthRange;
  /** Tokens emitted per sample when the caller gives no budget. */
  tokenBudget: number;
  /** Samples printed per CLI run. */
  samples: number;
}

export const defaultSettings: Readonly<GrammarwalkSettings> = Object.freeze({
  defaultProbability: 0.5,
  classLength: Object.freeze({ min: 3, max: 4 }),
  tokenBudget: 100,
  samples: 1,
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function readLengthRange(value: unknown, fallback: LengthRange): LengthRange {
  if (value === undefined) return { ...fallback };
  if (!isRecord(value)) {
    throw new ConfigError('classLength must be an object with min and max');
  }
  const min = value.min ?? fallback.min;
  const max = value.max ?? fallback.max;
  if (!isNonNegativeInteger(min) || !isNonNegativeInteger(max) || max < min) {
    throw new ConfigError(`classLength must satisfy 0 <= min <= max, got ${String(min)}-${String(max)}`);
  }
  return { min, max };
}

/**
 * Merge user settings over the defaults, rejecting values of the wrong shape.
 */
export function resolveSettings(input: unknown = {}): GrammarwalkSettings {
  if (!isRecord(input)) {
    throw new ConfigError('Settings must be a JSON object');
  }

  const defaultProbability = input.defaultProbability ?? defaultSettings.defaultProbability;
  if (typeof defaultProbability !== 'number' || !Number.isFinite(defaultProbability) || defaultProbability < 0) {
    throw new ConfigError('defaultProbability must be a non-negative number');
  }

  const tokenBudget = input.tokenBudget ?? defaultSettings.tokenBudget;
  if (!isNonNegativeInteger(tokenBudget)) {
    throw new ConfigError('tokenBudget must be a non-negative integer');
  }

  const samples = input.samples ?? defaultSettings.samples;
  if (!isNonNegativeInteger(samples) || samples < 1) {
    throw new ConfigError('samples must be a positive integer');
  }

  return {
    defaultProbability,
    classLength: readLengthRange(input.classLength, defaultSettings.classLength),
    tokenBudget,
    samples,
  };
}

export async function loadSettingsFile(filePath: string): Promise<GrammarwalkSettings> {
  const text = await fs.readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigError(`Could not parse ${filePath}: ${errorMessage(error)}`);
  }
  return resolveSettings(parsed);
}
