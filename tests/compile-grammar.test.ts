// tests/compile-grammar.test.ts
import path from 'node:path';
import {
  GrammarCompileError,
  blankCommentLines,
  compileGrammar,
  compileGrammarFromFile,
  generate,
  generateSeeded,
  generateWith,
  loadGrammarFile,
  readGrammarStatements,
  tryCompileGrammar,
} from '../src/grammar/index';
import { XorShiftRandom } from '../src/random/index';
import { createLogger, type LogSink } from '../src/utils/log';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

function collectingSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return { lines, out: (line) => lines.push(line), err: (line) => lines.push(line) };
}

describe('compileGrammar', () => {
  it('should compile a grammar and list its rules', () => {
    const grammar = compileGrammar("A: B 'z'; B: 'y';");
    expect(grammar.rules).toEqual(['A', 'B']);
    expect(grammar.source).toBe("A: B 'z'; B: 'y';");
    expect(Object.isFrozen(grammar)).toBe(true);
  });

  it('should keep every cumulative vector non-decreasing and ending at 1', () => {
    const grammar = compileGrammar("S: ('a' <0.1> | 'b' <0.7> | 'c') * [a-z] ? T; T: 'x' + | 'y';");
    for (const node of grammar.automaton.values()) {
      const { cumulative } = node;
      for (let i = 1; i < cumulative.length; i++) {
        expect(cumulative[i]).toBeGreaterThanOrEqual(cumulative[i - 1]);
      }
      if (cumulative.length > 0) {
        expect(Math.abs(cumulative[cumulative.length - 1] - 1)).toBeLessThan(1e-4);
      }
      expect(cumulative).toHaveLength(node.edges.length);
    }
  });

  it('should throw a GrammarCompileError carrying every error', () => {
    try {
      compileGrammar("A: 'x'");
      throw new Error('Expected compileGrammar to throw');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(GrammarCompileError);
      if (err instanceof GrammarCompileError) {
        expect(err.errors.map((e) => e.code)).toEqual(['missing-semicolon']);
        expect(err.message).toBe("Grammar compilation failed: Missing ';' at end of input");
        expect(err.source).toBe("A: 'x'");
        expect(err.errors[0].source).toBe("A: 'x'");
      }
    }
  });

  it.each([
    ["A: 'x'", 'missing-semicolon'],
    ['A: B;', 'undefined-reference'],
    ["A: 'x'; A: 'y';", 'multiple-definitions'],
    ["A: 'x", 'unterminated-delimiter'],
  ])('should reject %j with %s', (text, code) => {
    const result = tryCompileGrammar(text);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0].code).toBe(code);
    }
  });

  it('should warn about zero-weight nodes and fall back to equal weights', () => {
    const sink = collectingSink();
    const logger = createLogger({ useColor: false, sink });
    const grammar = compileGrammar("R: 'a' <0> | 'b' <0>;", { logger, grammarSource: 'zero' });
    expect(sink.lines).toEqual(['⚠️  zero: node 1 has zero total weight, using equal weights']);
    expect(grammar.automaton.node(1).cumulative).toEqual([0.5, 1]);
  });

  it('should log compile statistics in verbose mode', () => {
    const sink = collectingSink();
    const logger = createLogger({ useColor: false, verbose: true, sink });
    compileGrammar("R: 'a';", { logger });
    expect(sink.lines).toEqual([
      '🐛 grammar: scanned 4 tokens',
      '🐛 grammar: compiled 1 rules into 5 nodes',
    ]);
  });
});

describe('generation', () => {
  it('should emit a single literal', () => {
    const grammar = compileGrammar("Rule: 'x';");
    expect(generate(grammar, 'Rule', 1)).toBe('x');
  });

  it('should call rules and return to the caller', () => {
    const grammar = compileGrammar("A: B 'z'; B: 'y';");
    expect(generateSeeded(grammar, 'A', 7, 2)).toBe('yz');
  });

  it('should split alternatives evenly', () => {
    const grammar = compileGrammar("Rule: 'a' | 'b';");
    const random = new XorShiftRandom(2024);
    let a = 0;
    const runs = 10_000;
    for (let i = 0; i < runs; i++) {
      if (generateWith(grammar, 'Rule', 5, random).output === 'a') a++;
    }
    expect(a / runs).toBeGreaterThan(0.45);
    expect(a / runs).toBeLessThan(0.55);
  });

  it('should take an optional term about half the time', () => {
    const grammar = compileGrammar("Rule: 'a' ?;");
    const random = new XorShiftRandom(77);
    const counts = { empty: 0, a: 0 };
    for (let i = 0; i < 10_000; i++) {
      const output = generateWith(grammar, 'Rule', 1, random).output;
      if (output === '') counts.empty++;
      else if (output === 'a') counts.a++;
    }
    expect(counts.empty + counts.a).toBe(10_000);
    expect(counts.a / 10_000).toBeGreaterThan(0.45);
    expect(counts.a / 10_000).toBeLessThan(0.55);
  });

  it('should follow annotation weights', () => {
    const grammar = compileGrammar("Rule: 'a' <0.9> | 'b' <0.1>;");
    const random = new XorShiftRandom(5);
    let a = 0;
    for (let i = 0; i < 5_000; i++) {
      if (generateWith(grammar, 'Rule', 1, random).output === 'a') a++;
    }
    expect(a / 5_000).toBeGreaterThan(0.85);
    expect(a / 5_000).toBeLessThan(0.95);
  });

  it('should be reproducible for a seed', () => {
    const grammar = compileGrammar("Bits: ('0' | '1') + <0.9>;");
    expect(generateSeeded(grammar, 'Bits', 42, 5)).toBe(generateSeeded(grammar, 'Bits', 42, 5));

    const outputs = new Set<string>();
    for (let seed = 1; seed <= 20; seed++) {
      outputs.add(generateSeeded(grammar, 'Bits', seed, 5));
    }
    expect(outputs.size).toBeGreaterThan(1);
  });

  it('should reject a seed that is not a finite number', () => {
    const grammar = compileGrammar("R: 'x';");
    expect(() => generateSeeded(grammar, 'R', Number.NaN, 3)).toThrow('Seed must be a finite number, got NaN');
  });

  it('should never exceed the token budget', () => {
    const grammar = compileGrammar("S: 'a' ('b' S) *;");
    const random = new XorShiftRandom(3);
    for (let i = 0; i < 200; i++) {
      const result = generateWith(grammar, 'S', 7, random);
      expect(result.tokens).toBeLessThanOrEqual(7);
      expect(result.output.length).toBe(result.tokens);
    }
  });

  it('should share one compiled grammar between walks', () => {
    const grammar = compileGrammar("R: 'a' | 'b';");
    const before = [...grammar.automaton.values()].map((node) => node.cumulative);
    generateSeeded(grammar, 'R', 1, 10);
    generateSeeded(grammar, 'R', 2, 10);
    expect([...grammar.automaton.values()].map((node) => node.cumulative)).toEqual(before);
  });
});

describe('grammar files', () => {
  it('should assemble statements across lines and drop comments', () => {
    const statements = readGrammarStatements("// header\nA: 'x'\n  | 'y';\n\n  B: 'z'; \n");
    expect(statements).toEqual(["A: 'x' | 'y';", "B: 'z';"]);
  });

  it('should keep an unterminated trailing statement', () => {
    expect(readGrammarStatements("A: 'x';\nB: 'y'")).toEqual(["A: 'x';", "B: 'y'"]);
  });

  it('should blank comment lines and keep every other line in place', () => {
    expect(blankCommentLines("// header\nA: 'x'\r\n  // note\n  | 'y';")).toBe("\nA: 'x'\n\n  | 'y';");
  });

  it('should load a grammar file with its line layout', async () => {
    const text = await loadGrammarFile(fixture('names.grammar'));
    expect(text).toBe(
      [
        '',
        "Greeting: 'Hello' <0.7> | 'Hi' <0.3>;",
        '',
        "Name: Greeting ' ' Word",
        "      ( '!' )?;",
        '',
        '',
        'Word: [a-z];',
        '',
      ].join('\n'),
    );
  });

  it('should report positions as lines of the file', async () => {
    try {
      await compileGrammarFromFile(fixture('commented.grammar'));
      throw new Error('Expected compileGrammarFromFile to throw');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(GrammarCompileError);
      if (err instanceof GrammarCompileError) {
        const [error] = err.errors;
        expect(error.code).toBe('missing-semicolon');
        expect(error.line).toBe(6);
        expect(error.column).toBe(4);
        expect(err.source.split('\n')[5]).toBe("B: 'y'");
      }
    }
  });

  it('should compile a grammar file', async () => {
    const grammar = await compileGrammarFromFile(fixture('names.grammar'));
    expect(grammar.rules).toEqual(['Greeting', 'Name', 'Word']);
    const output = generateSeeded(grammar, 'Name', 9, 10);
    expect(output).toMatch(/^(Hello|Hi) [a-z]{3,4}!?$/);
  });

  it('should report the unterminated statement of a file', async () => {
    await expect(compileGrammarFromFile(fixture('unterminated.grammar'))).rejects.toThrow(
      "Grammar compilation failed: Missing ';' at end of input",
    );
  });
});
