import fs from 'node:fs/promises';
import { CharClassSampler, type LengthRange } from '../charclass/index';
import { defaultSettings } from '../config';
import { freeze, type Automaton } from '../graph/frozen';
import { scan, type ScanError } from '../lexer/index';
import { GrammarParser, type ParseError } from '../parser/index';
import { XorShiftRandom, type RandomSource, type SeedInput } from '../random/index';
import { silentLogger, type Logger } from '../utils/log';
import { Walker, type WalkResult } from '../walker/index';

export type GrammarSyntaxError = ScanError | ParseError;

/**
 * Thrown by `compileGrammar` when the text does not compile. Carries every
 * error collected; the first one is the authoritative cause.
 */
export class GrammarCompileError extends Error {
  public readonly errors: GrammarSyntaxError[];
  public readonly source: string;

  constructor(errors: GrammarSyntaxError[], source: string) {
    const first = errors[0];
    super(`Grammar compilation failed: ${first ? first.message : 'unknown error'}`);
    this.name = 'GrammarCompileError';
    this.errors = errors;
    this.source = source;
  }
}

export interface CompileOptions {
  defaultProbability?: number;
  classLength?: LengthRange;
  logger?: Logger;
  /** File name used in log lines. */
  grammarSource?: string;
}

export interface CompiledGrammar {
  readonly automaton: Automaton;
  readonly source: string;
  readonly rules: readonly string[];
}

export type CompileResult =
  | { success: true; grammar: CompiledGrammar }
  | { success: false; errors: GrammarSyntaxError[] };

function failure(errors: GrammarSyntaxError[], source: string): CompileResult {
  for (const error of errors) error.source = source;
  return { success: false, errors };
}

/**
 * Scan, parse, normalize and freeze grammar text. Never throws for bad
 * grammar text; internal defects still throw.
 */
export function tryCompileGrammar(text: string, options: CompileOptions = {}): CompileResult {
  const logger = options.logger ?? silentLogger;
  const label = options.grammarSource ?? 'grammar';

  const { tokens, errors: scanErrors } = scan(text);
  if (scanErrors.length > 0) {
    return failure(scanErrors, text);
  }
  logger.debug(`${label}: scanned ${tokens.length} tokens`);

  const sampler = new CharClassSampler(options.classLength ?? defaultSettings.classLength);
  const parser = new GrammarParser(tokens, {
    defaultProbability: options.defaultProbability ?? defaultSettings.defaultProbability,
    sampler,
  });
  const parseErrors = parser.parse();
  if (parseErrors.length > 0) {
    return failure(parseErrors, text);
  }

  for (const id of parser.graph.normalize()) {
    logger.warn(`${label}: node ${id} has zero total weight, using equal weights`);
  }

  const automaton = freeze(parser.graph, sampler);
  const rules = Object.freeze(automaton.ruleNames());
  logger.debug(`${label}: compiled ${rules.length} rules into ${automaton.size} nodes`);

  return { success: true, grammar: Object.freeze({ automaton, source: text, rules }) };
}

export function compileGrammar(text: string, options: CompileOptions = {}): CompiledGrammar {
  const result = tryCompileGrammar(text, options);
  if (!result.success) {
    throw new GrammarCompileError(result.errors, text);
  }
  return result.grammar;
}

/**
 * Assemble grammar file content into statements: lines are trimmed, blank
 * lines and `//` comment lines dropped, and lines are joined until one ends
 * with `;`. A trailing statement without `;` is kept so the parser reports it.
 */
export function readGrammarStatements(content: string): string[] {
  const statements: string[] = [];
  let current = '';

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('//')) continue;

    current += `${line} `;
    if (line.endsWith(';')) {
      statements.push(current.trim());
      current = '';
    }
  }

  if (current.trim().length > 0) {
    statements.push(current.trim());
  }
  return statements;
}

/**
 * Grammar text of a file with its `//` comment lines blanked. Every other
 * line stays where it was, so diagnostics point at the file's own lines and
 * columns.
 */
export function blankCommentLines(content: string): string {
  return content
    .split(/\r?\n/)
    .map((line) => (line.trim().startsWith('//') ? '' : line))
    .join('\n');
}

export async function loadGrammarFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath, 'utf-8');
  return blankCommentLines(content);
}

export async function compileGrammarFromFile(filePath: string, options: CompileOptions = {}): Promise<CompiledGrammar> {
  const text = await loadGrammarFile(filePath);
  return compileGrammar(text, { grammarSource: filePath, ...options });
}

/**
 * Walk `grammar` from `start` with a caller-supplied random source, returning
 * the full walk report.
 */
export function generateWith(grammar: CompiledGrammar, start: string, budget: number, random: RandomSource): WalkResult {
  return new Walker(grammar.automaton, start, budget, random).run();
}

/** Non-deterministic generation, seeded from system entropy. */
export function generate(grammar: CompiledGrammar, start: string, budget: number = defaultSettings.tokenBudget): string {
  return generateWith(grammar, start, budget, new XorShiftRandom(0)).output;
}

/** Deterministic generation: the same seed always yields the same text. */
export function generateSeeded(grammar: CompiledGrammar, start: string, seed: SeedInput, budget: number = defaultSettings.tokenBudget): string {
  return generateWith(grammar, start, budget, new XorShiftRandom(seed)).output;
}
