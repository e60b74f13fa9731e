import {
  compileGrammar,
  generateSeeded,
  generate,
  loadGrammarFile,
  type CompileOptions,
  type CompiledGrammar,
} from '../grammar/index';
import type { SeedInput } from '../random/index';
import { silentLogger, type Logger } from '../utils/log';
import { GenerationError } from '../walker/index';

/**
 * Named collection of compiled grammars. Grammars are independent: a rule in
 * one grammar can never refer to a rule in another.
 */
export class GrammarRegistry {
  private readonly grammars = new Map<string, CompiledGrammar>();
  private readonly options: CompileOptions;
  private readonly logger: Logger;

  constructor(options: CompileOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Compile `text` and store it under `name`, replacing any previous grammar
   * of that name. A grammar that fails to compile leaves the registry as it
   * was and the GrammarCompileError propagates.
   */
  parseGrammar(name: string, text: string): CompiledGrammar {
    const grammar = compileGrammar(text, { grammarSource: name, ...this.options });
    this.grammars.set(name, grammar);
    this.logger.debug(`Registered grammar '${name}' (${grammar.rules.length} rules)`);
    return grammar;
  }

  async parseGrammarFile(name: string, filePath: string): Promise<CompiledGrammar> {
    const text = await loadGrammarFile(filePath);
    const grammar = compileGrammar(text, { grammarSource: filePath, ...this.options });
    this.grammars.set(name, grammar);
    this.logger.debug(`Registered grammar '${name}' from ${filePath}`);
    return grammar;
  }

  generateRandom(name: string, start: string, tokens: number): string {
    return generate(this.require(name), start, tokens);
  }

  generateWithSeed(name: string, start: string, seed: SeedInput, tokens: number): string {
    return generateSeeded(this.require(name), start, seed, tokens);
  }

  has(name: string): boolean {
    return this.grammars.has(name);
  }

  get(name: string): CompiledGrammar | undefined {
    return this.grammars.get(name);
  }

  names(): string[] {
    return [...this.grammars.keys()];
  }

  remove(name: string): boolean {
    return this.grammars.delete(name);
  }

  private require(name: string): CompiledGrammar {
    const grammar = this.grammars.get(name);
    if (!grammar) {
      throw new GenerationError(`No grammar registered under '${name}'`, 'unknown-grammar');
    }
    return grammar;
  }
}
