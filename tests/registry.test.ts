// tests/registry.test.ts
import path from 'node:path';
import { GrammarCompileError, compileGrammar, generateSeeded } from '../src/grammar/index';
import { GrammarRegistry } from '../src/registry/index';
import { GenerationError } from '../src/walker/index';

describe('GrammarRegistry', () => {
  it('should register grammars under their names', () => {
    const registry = new GrammarRegistry();
    const grammar = registry.parseGrammar('greet', "Hi: 'hello' | 'hey';");
    expect(registry.has('greet')).toBe(true);
    expect(registry.get('greet')).toBe(grammar);
    expect(registry.names()).toEqual(['greet']);
  });

  it('should generate the same text as the standalone API for a seed', () => {
    const registry = new GrammarRegistry();
    const text = "S: ('a' | 'b' | 'c') + <0.8>;";
    registry.parseGrammar('abc', text);
    expect(registry.generateWithSeed('abc', 'S', 12, 6)).toBe(generateSeeded(compileGrammar(text), 'S', 12, 6));
  });

  it('should generate without a seed', () => {
    const registry = new GrammarRegistry();
    registry.parseGrammar('one', "R: 'x';");
    expect(registry.generateRandom('one', 'R', 3)).toBe('x');
  });

  it('should keep the previous grammar when a replacement fails', () => {
    const registry = new GrammarRegistry();
    const original = registry.parseGrammar('g', "R: 'x';");
    expect(() => registry.parseGrammar('g', "R: 'y'")).toThrow(GrammarCompileError);
    expect(registry.get('g')).toBe(original);
  });

  it('should keep grammars independent', () => {
    const registry = new GrammarRegistry();
    registry.parseGrammar('first', "A: 'a';");
    expect(() => registry.parseGrammar('second', 'B: A;')).toThrow("Definition of 'A' not found");
    expect(registry.has('second')).toBe(false);
  });

  it('should reject unknown grammar names', () => {
    const registry = new GrammarRegistry();
    try {
      registry.generateRandom('missing', 'R', 5);
      throw new Error('Expected generateRandom to throw');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(GenerationError);
      if (err instanceof GenerationError) {
        expect(err.code).toBe('unknown-grammar');
        expect(err.message).toBe("No grammar registered under 'missing'");
      }
    }
  });

  it('should remove grammars', () => {
    const registry = new GrammarRegistry();
    registry.parseGrammar('g', "R: 'x';");
    expect(registry.remove('g')).toBe(true);
    expect(registry.remove('g')).toBe(false);
    expect(registry.names()).toEqual([]);
  });

  it('should load grammars from files', async () => {
    const registry = new GrammarRegistry({ classLength: { min: 1, max: 1 } });
    const grammar = await registry.parseGrammarFile('names', path.join(__dirname, 'fixtures', 'names.grammar'));
    expect(grammar.rules).toEqual(['Greeting', 'Name', 'Word']);
    expect(registry.generateWithSeed('names', 'Word', 4, 1)).toMatch(/^[a-z]$/);
  });
});
