// tests/walker.test.ts
import { CharClassSampler } from '../src/charclass/index';
import { compileGrammar } from '../src/grammar/index';
import { freeze } from '../src/graph/frozen';
import { SyntaxGraph } from '../src/graph/index';
import { XorShiftRandom } from '../src/random/index';
import { GenerationError, Walker, unescapeLiteral, walk } from '../src/walker/index';
import { ScriptedRandom } from './helpers/scripted-random';

describe('unescapeLiteral', () => {
  it('should resolve known escapes', () => {
    expect(unescapeLiteral('line1\\nline2')).toBe('line1\nline2');
    expect(unescapeLiteral('a\\tb\\rc')).toBe('a\tb\rc');
    expect(unescapeLiteral('\\\\')).toBe('\\');
    expect(unescapeLiteral("\\'\\\"")).toBe('\'"');
  });

  it('should keep unknown escapes and a trailing backslash', () => {
    expect(unescapeLiteral('a\\qb')).toBe('a\\qb');
    expect(unescapeLiteral('x\\')).toBe('x\\');
  });
});

describe('Walker', () => {
  const choice = compileGrammar("R: 'a' | 'b';");

  it('should follow the branch selected by the draw', () => {
    expect(new Walker(choice.automaton, 'R', 10, new ScriptedRandom([0.3])).run()).toEqual({
      output: 'a',
      tokens: 1,
      steps: 4,
      outcome: 'end',
    });
    expect(walk(choice.automaton, 'R', 10, new ScriptedRandom([0.7]))).toBe('b');
  });

  it('should return from rule calls to the caller', () => {
    const grammar = compileGrammar("A: B 'z'; B: 'y';");
    expect(new Walker(grammar.automaton, 'A', 3, new ScriptedRandom([0.5])).run()).toEqual({
      output: 'yz',
      tokens: 2,
      steps: 10,
      outcome: 'end',
    });
  });

  it('should stop when the token budget is spent', () => {
    const grammar = compileGrammar("A: B 'z'; B: 'y';");
    expect(new Walker(grammar.automaton, 'A', 2, new ScriptedRandom([0.5])).run()).toEqual({
      output: 'yz',
      tokens: 2,
      steps: 8,
      outcome: 'budget',
    });
  });

  it('should emit nothing with a zero budget', () => {
    expect(new Walker(choice.automaton, 'R', 0, new ScriptedRandom([0.3])).run()).toEqual({
      output: '',
      tokens: 0,
      steps: 0,
      outcome: 'budget',
    });
  });

  it('should keep looping until the budget for +', () => {
    const grammar = compileGrammar("R: 'a' +;");
    const result = new Walker(grammar.automaton, 'R', 3, new ScriptedRandom([0.2])).run();
    expect(result.output).toBe('aaa');
    expect(result.outcome).toBe('budget');
  });

  it('should skip an optional term', () => {
    const grammar = compileGrammar("R: 'a' ?;");
    expect(walk(grammar.automaton, 'R', 1, new ScriptedRandom([0.9]))).toBe('');
    expect(walk(grammar.automaton, 'R', 1, new ScriptedRandom([0.1]))).toBe('a');
  });

  it('should pass through group exits without ending the rule', () => {
    const grammar = compileGrammar("R: ('a' | 'b') 'c';");
    expect(walk(grammar.automaton, 'R', 10, new ScriptedRandom([0.3]))).toBe('ac');
    expect(walk(grammar.automaton, 'R', 10, new ScriptedRandom([0.7]))).toBe('bc');
  });

  it('should loop back from a group exit for ^', () => {
    const grammar = compileGrammar("R: ('a' ^) 'b';");
    expect(new Walker(grammar.automaton, 'R', 3, new ScriptedRandom([0.5])).run()).toMatchObject({
      output: 'aaa',
      outcome: 'budget',
    });
    expect(walk(grammar.automaton, 'R', 10, new ScriptedRandom([0.9]))).toBe('ab');
  });

  it('should return from a rule end even when ^ loops to it', () => {
    const grammar = compileGrammar("A: B 'z'; B: 'y' ^;");
    expect(new Walker(grammar.automaton, 'A', 10, new ScriptedRandom([0.5])).run()).toMatchObject({
      output: 'yz',
      outcome: 'end',
    });
  });

  it('should count a class sample as one token', () => {
    const grammar = compileGrammar("R: [x] 'y';", { classLength: { min: 2, max: 2 } });
    const result = new Walker(grammar.automaton, 'R', 10, new ScriptedRandom([0.5])).run();
    expect(result.output).toBe('xxy');
    expect(result.tokens).toBe(2);
  });

  it('should unescape literals as they are emitted', () => {
    const grammar = compileGrammar("R: 'one\\ntwo';");
    expect(walk(grammar.automaton, 'R', 5, new XorShiftRandom(1))).toBe('one\ntwo');
  });

  it('should step one node at a time and track call depth', () => {
    const grammar = compileGrammar("A: B; B: 'y';");
    const walker = new Walker(grammar.automaton, 'A', 5, new ScriptedRandom([0.5]));
    expect(walker.depth).toBe(0);
    expect(walker.step()).toBe(true); // header A
    expect(walker.step()).toBe(true); // pointer to B
    expect(walker.depth).toBe(1);
    while (walker.step()) {
      // drain
    }
    expect(walker.done).toBe(true);
    expect(walker.depth).toBe(0);
    expect(walker.step()).toBe(false);
  });

  it('should stop at a node without outgoing edges', () => {
    const graph = new SyntaxGraph();
    graph.declareRule('R');
    graph.normalize();
    const automaton = freeze(graph, new CharClassSampler());
    expect(new Walker(automaton, 'R', 5, new ScriptedRandom([0.5])).run().outcome).toBe('dead-end');
  });

  it('should reject an unknown start rule', () => {
    expect(() => new Walker(choice.automaton, 'Nope', 5, new XorShiftRandom(1))).toThrow(GenerationError);
    try {
      walk(choice.automaton, 'Nope', 5, new XorShiftRandom(1));
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(GenerationError);
      if (err instanceof GenerationError) {
        expect(err.code).toBe('unknown-start-rule');
        expect(err.message).toBe("Could not find starting rule 'Nope'");
      }
    }
  });

  it.each([-1, 1.5, Number.NaN])('should reject the budget %p', (budget) => {
    expect(() => new Walker(choice.automaton, 'R', budget, new XorShiftRandom(1))).toThrow(
      'Token budget must be a non-negative integer',
    );
  });
});
