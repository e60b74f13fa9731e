import { CharClassSampler } from '../charclass/index';
import { START_ID, SyntaxGraph } from '../graph/index';
import { TokenStream, tokenLocation, type Token } from '../lexer/index';
import { GrammarError } from '../utils/errors';
import type { Location } from '../utils/types';

export type ParseErrorCode =
  | 'missing-rule-name'
  | 'missing-colon'
  | 'missing-semicolon'
  | 'stray-open'
  | 'stray-close'
  | 'multiple-definitions'
  | 'negative-probability'
  | 'malformed-probability'
  | 'undefined-reference';

export class ParseError extends GrammarError<ParseErrorCode> {
  constructor(message: string, code: ParseErrorCode, location?: Location) {
    super(message, code, location);
    this.name = 'ParseError';
  }
}

export const DEFAULT_PROBABILITY = 0.5;

export interface ParserOptions {
  /** Weight used when a term or operator carries no `<p>` annotation. */
  defaultProbability?: number;
  /** Receives every character class met while parsing. */
  sampler?: CharClassSampler;
}

interface Scope {
  /** Node the scope's alternatives start from. */
  root: number;
  /** Rule end node, or the exit node of a parenthesized group. */
  end: number;
  /** Opening `(` of a group scope. */
  opener?: Token;
}

interface ScopeResult {
  /** Start of the last sequence element, the target of `?`, `+` and `*`. */
  entry: number | null;
  exit: number;
}

const NUMERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseProbability(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Recursive-descent parser that writes the rule graph directly.
 *
 * Every term becomes `buffer -> term -> jump`, where the jump node is the
 * sequencing point for whatever follows. Quantifiers add skip and loop edges
 * between the start of the last term and the current buffer; `|` closes the
 * current alternative into the scope's end node.
 */
export class GrammarParser {
  public readonly graph: SyntaxGraph;
  public readonly sampler: CharClassSampler;
  public readonly errors: ParseError[] = [];
  private readonly stream: TokenStream;
  private readonly defaultProbability: number;

  constructor(tokens: Token[] | TokenStream, options: ParserOptions = {}) {
    this.stream = tokens instanceof TokenStream ? tokens : new TokenStream(tokens);
    this.graph = new SyntaxGraph();
    this.sampler = options.sampler ?? new CharClassSampler();
    this.defaultProbability = options.defaultProbability ?? DEFAULT_PROBABILITY;
  }

  /**
   * Parse the whole program. Stops after the first statement that produced an
   * error. References are checked only once the program parsed cleanly.
   */
  parse(): ParseError[] {
    while (this.stream.hasNext()) {
      if (!this.parseStatement()) break;
    }
    if (this.errors.length === 0) {
      this.checkReferences();
    }
    return this.errors;
  }

  private parseStatement(): boolean {
    const subject = this.stream.next();
    if (!subject || subject.kind !== 'identifier') {
      this.fail('Expected rule name at start of statement', 'missing-rule-name', subject);
      return false;
    }

    const colon = this.stream.next();
    if (!colon || colon.kind !== 'colon') {
      this.fail(`Expected ':' after rule name '${subject.text}'`, 'missing-colon', colon ?? subject);
      return false;
    }

    const location = tokenLocation(subject);
    const { entry, endId, redeclared } = this.graph.declareRule(subject.text, location);
    if (redeclared) {
      this.errors.push(new ParseError(`Multiple definitions for '${subject.text}'`, 'multiple-definitions', location));
    }
    this.graph.addEdge(START_ID, entry.id, 1.0);

    const result = this.parseBody({ root: entry.id, end: endId });
    return result !== null && this.errors.length === 0;
  }

  private parseBody(scope: Scope): ScopeResult | null {
    let buffer = scope.root;
    let sequenceStart: number | null = null;

    for (;;) {
      const token = this.stream.next();
      if (!token) {
        if (scope.opener) {
          this.fail("Unclosed '(' at end of input", 'stray-open', scope.opener);
        } else {
          this.fail("Missing ';' at end of input", 'missing-semicolon', this.stream.last());
        }
        return null;
      }

      switch (token.kind) {
        case 'identifier': {
          const target = this.graph.referenceRule(token.text, tokenLocation(token));
          const pointer = this.graph.ensureNode(this.graph.allocateControlId(), 'pointer');
          pointer.pointer = target.id;
          this.graph.addEdge(buffer, pointer.id, this.resolveProbability());
          const jump = this.graph.ensureNode(this.graph.allocateControlId(), 'jump');
          this.graph.addEdge(pointer.id, jump.id, 1.0);
          sequenceStart = buffer;
          buffer = jump.id;
          break;
        }
        case 'literal':
        case 'charClass': {
          const leaf = this.graph.ensureNode(this.graph.allocateContentId(), token.kind === 'literal' ? 'char' : 'regex');
          leaf.content = token.text;
          if (token.kind === 'charClass') {
            this.sampler.compile(token.text);
          }
          this.graph.addEdge(buffer, leaf.id, this.resolveProbability());
          const jump = this.graph.ensureNode(this.graph.allocateControlId(), 'jump');
          this.graph.addEdge(leaf.id, jump.id, 1.0);
          sequenceStart = buffer;
          buffer = jump.id;
          break;
        }
        case 'colon':
          this.fail("Missing ';' before next rule", 'missing-semicolon', token);
          return null;
        case 'maybe': {
          const p = this.resolveProbability();
          if (sequenceStart !== null) {
            this.graph.addEdge(sequenceStart, buffer, 1 - p);
          }
          break;
        }
        case 'oneOrMore': {
          const p = this.resolveProbability();
          if (sequenceStart !== null) {
            this.graph.addEdge(buffer, sequenceStart, p);
          }
          break;
        }
        case 'zeroOrMore': {
          const p = this.resolveProbability();
          if (sequenceStart !== null) {
            this.graph.addEdge(sequenceStart, buffer, 1 - p);
            this.graph.addEdge(buffer, sequenceStart, p);
          }
          break;
        }
        case 'infinite':
          if (sequenceStart !== null) {
            this.graph.addEdge(scope.end, sequenceStart, 1.0);
          }
          break;
        case 'alternative':
          this.graph.addEdge(buffer, scope.end, this.resolveProbability());
          buffer = scope.root;
          sequenceStart = null;
          break;
        case 'groupOpen': {
          const exit = this.graph.ensureNode(this.graph.allocateControlId(), 'jump');
          const group = this.parseBody({ root: buffer, end: exit.id, opener: token });
          if (!group) return null;
          sequenceStart = group.entry;
          buffer = group.exit;
          break;
        }
        case 'groupClose':
          if (!scope.opener) {
            this.fail("Stray ')' with no open group", 'stray-close', token);
            return null;
          }
          this.graph.addEdge(buffer, scope.end, 1.0);
          return { entry: scope.root, exit: scope.end };
        case 'statementEnd':
          if (scope.opener) {
            this.fail("Unclosed '(' before ';'", 'stray-open', scope.opener);
            return null;
          }
          this.graph.addEdge(buffer, scope.end, 1.0);
          return { entry: sequenceStart, exit: buffer };
        case 'probability':
          // An annotation that follows nothing it can weight is ignored.
          break;
      }
    }
  }

  /**
   * Weight for the term or operator just consumed: the following `<p>` when
   * present and valid, the default otherwise. A malformed annotation is left
   * in the stream.
   */
  private resolveProbability(): number {
    const next = this.stream.peek();
    if (next?.kind !== 'probability') return this.defaultProbability;

    const value = parseProbability(next.text);
    if (value === null) {
      this.fail(`Failed to parse probability '${next.text}'`, 'malformed-probability', next);
      return this.defaultProbability;
    }
    this.stream.next();
    if (value < 0) {
      this.fail(`Negative probability '${next.text}'`, 'negative-probability', next);
      return 0;
    }
    return value;
  }

  private checkReferences(): void {
    for (const entry of this.graph.undeclaredRules()) {
      this.errors.push(new ParseError(`Definition of '${entry.name}' not found`, 'undefined-reference', entry.firstSeen));
    }
  }

  private fail(message: string, code: ParseErrorCode, token: Token | null): void {
    this.errors.push(new ParseError(message, code, token ? tokenLocation(token) : undefined));
  }
}

export interface ParsedGrammar {
  graph: SyntaxGraph;
  sampler: CharClassSampler;
  errors: ParseError[];
}

export function parseTokens(tokens: Token[], options: ParserOptions = {}): ParsedGrammar {
  const parser = new GrammarParser(tokens, options);
  const errors = parser.parse();
  return { graph: parser.graph, sampler: parser.sampler, errors };
}
