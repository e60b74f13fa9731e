import type { Automaton } from '../graph/frozen';
import { CompileDefect, pickIndex } from '../graph/index';
import type { RandomSource } from '../random/index';
import { GrammarError } from '../utils/errors';

export type GenerationErrorCode = 'unknown-start-rule' | 'invalid-budget' | 'invalid-seed' | 'unknown-grammar';

export class GenerationError extends GrammarError<GenerationErrorCode> {
  constructor(message: string, code: GenerationErrorCode) {
    super(message, code);
    this.name = 'GenerationError';
  }
}

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/**
 * Resolve backslash escapes in literal text. Unknown escapes keep their
 * backslash, as does a trailing lone backslash.
 */
export function unescapeLiteral(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== '\\' || i + 1 >= text.length) {
      result += ch;
      continue;
    }
    const next = text[i + 1];
    const mapped = ESCAPES[next];
    result += mapped ?? `\\${next}`;
    i++;
  }
  return result;
}

/** Why a walk stopped. */
export type WalkOutcome = 'budget' | 'end' | 'dead-end';

export interface WalkResult {
  output: string;
  tokens: number;
  steps: number;
  outcome: WalkOutcome;
}

/**
 * One walk over an automaton. Rule calls are emulated with an explicit stack:
 * a pointer pushes its continuation and jumps to the referenced header, an end
 * node pops back to it.
 */
export class Walker {
  private readonly automaton: Automaton;
  private readonly random: RandomSource;
  private readonly budget: number;
  private readonly stack: number[] = [];
  private current: number;
  private produced = 0;
  private steps = 0;
  private output = '';
  private outcome: WalkOutcome | null = null;

  constructor(automaton: Automaton, start: string, budget: number, random: RandomSource) {
    if (!Number.isInteger(budget) || budget < 0) {
      throw new GenerationError(`Token budget must be a non-negative integer, got ${budget}`, 'invalid-budget');
    }
    const startId = automaton.ruleId(start);
    if (startId === undefined) {
      throw new GenerationError(`Could not find starting rule '${start}'`, 'unknown-start-rule');
    }
    this.automaton = automaton;
    this.random = random;
    this.budget = budget;
    this.current = startId;
  }

  get done(): boolean {
    return this.outcome !== null;
  }

  get depth(): number {
    return this.stack.length;
  }

  /** Advance by one node. Returns false once the walk has finished. */
  step(): boolean {
    if (this.outcome !== null) return false;
    if (this.produced >= this.budget) {
      this.outcome = 'budget';
      return false;
    }

    this.steps++;
    const node = this.automaton.node(this.current);

    switch (node.kind) {
      case 'char':
        this.output += unescapeLiteral(node.content ?? '');
        this.produced++;
        break;
      case 'regex':
        this.output += this.automaton.sampler.sample(node.content ?? '', this.random);
        this.produced++;
        break;
      case 'pointer': {
        const continuation = node.edges[0];
        if (!continuation) {
          throw new CompileDefect(`Pointer ${node.id} has no continuation`, 'dangling-reference');
        }
        this.stack.push(continuation.target);
        this.current = node.pointer;
        return true;
      }
      case 'end': {
        const resume = this.stack.pop();
        if (resume === undefined) {
          this.outcome = 'end';
          return false;
        }
        this.current = resume;
        return true;
      }
      default:
        break;
    }

    if (node.edges.length === 0) {
      this.outcome = 'dead-end';
      return false;
    }

    const index = pickIndex(node.cumulative, this.random.next());
    this.current = node.edges[index].target;
    return true;
  }

  run(): WalkResult {
    while (this.step()) {
      // keep stepping
    }
    return {
      output: this.output,
      tokens: this.produced,
      steps: this.steps,
      outcome: this.outcome ?? 'end',
    };
  }
}

export function walk(automaton: Automaton, start: string, budget: number, random: RandomSource): string {
  return new Walker(automaton, start, budget, random).run().output;
}
