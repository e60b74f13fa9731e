import moo from 'moo';
import { GrammarError } from '../utils/errors';
import { spanLocation, type Location } from '../utils/types';

export type TokenKind =
  | 'oneOrMore'     // +
  | 'zeroOrMore'    // *
  | 'infinite'      // ^
  | 'maybe'         // ?
  | 'alternative'   // |
  | 'statementEnd'  // ;
  | 'groupOpen'     // (
  | 'groupClose'    // )
  | 'colon'         // :
  | 'literal'       // '...'
  | 'probability'   // <...>
  | 'charClass'     // [...]
  | 'identifier';

const TOKEN_KINDS: ReadonlySet<string> = new Set<TokenKind>([
  'oneOrMore',
  'zeroOrMore',
  'infinite',
  'maybe',
  'alternative',
  'statementEnd',
  'groupOpen',
  'groupClose',
  'colon',
  'literal',
  'probability',
  'charClass',
  'identifier',
]);

function isTokenKind(type: string): type is TokenKind {
  return TOKEN_KINDS.has(type);
}

export interface Token {
  kind: TokenKind;
  /** Raw content. Delimited forms have their delimiters stripped; operators carry their symbol. */
  text: string;
  offset: number;
  line: number;
  col: number;
  /** Length in the source, delimiters included. */
  length: number;
}

export function tokenLocation(token: Token): Location {
  return spanLocation(token.line, token.col, token.offset, token.length);
}

export class ScanError extends GrammarError<'unterminated-delimiter'> {
  public readonly delimiter: string;

  constructor(delimiter: string, location: Location) {
    super(`unterminated '${delimiter}'`, 'unterminated-delimiter', location);
    this.name = 'ScanError';
    this.delimiter = delimiter;
  }
}

const stripDelimiters = (text: string): string => text.slice(1, -1);

// Order matters: moo tries regex rules in declaration order, so the closed
// delimited forms must come before the catch-all for an unterminated opener.
const grammarRules: moo.Rules = {
  literal: { match: /'[^']*'/, lineBreaks: true, value: stripDelimiters },
  probability: { match: /<[^>]*>/, lineBreaks: true, value: stripDelimiters },
  charClass: { match: /\[[^\]]*\]/, lineBreaks: true, value: stripDelimiters },
  unterminated: { match: /['<[][\s\S]*/, lineBreaks: true },
  identifier: /[A-Za-z_][A-Za-z0-9_]*/,
  oneOrMore: '+',
  zeroOrMore: '*',
  infinite: '^',
  maybe: '?',
  alternative: '|',
  statementEnd: ';',
  groupOpen: '(',
  groupClose: ')',
  colon: ':',
  skip: { match: /[^'<[A-Za-z_+*^?|;():]+/, lineBreaks: true },
};

export interface ScanResult {
  tokens: Token[];
  errors: ScanError[];
}

/**
 * Convert grammar text into tokens. Characters outside the notation are
 * skipped. An unterminated `'`, `<` or `[` swallows the rest of the input and
 * is reported as a ScanError at its opening position.
 */
export function scan(input: string): ScanResult {
  const lexer = moo.compile(grammarRules);
  const tokens: Token[] = [];
  const errors: ScanError[] = [];

  lexer.reset(input);
  let mooToken: moo.Token | undefined;
  while ((mooToken = lexer.next()) !== undefined) {
    const type = mooToken.type ?? 'skip';
    if (type === 'skip') continue;

    if (type === 'unterminated') {
      errors.push(new ScanError(mooToken.text[0], spanLocation(mooToken.line, mooToken.col, mooToken.offset, 1)));
      continue;
    }

    if (isTokenKind(type)) {
      tokens.push({
        kind: type,
        text: mooToken.value,
        offset: mooToken.offset,
        line: mooToken.line,
        col: mooToken.col,
        length: mooToken.text.length,
      });
    }
  }

  return { tokens, errors };
}

/**
 * Forward cursor over a scanned token list.
 */
export class TokenStream {
  private readonly tokens: Token[];
  private position = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  peek(): Token | null {
    return this.tokens[this.position] ?? null;
  }

  next(): Token | null {
    const token = this.tokens[this.position] ?? null;
    if (token) this.position++;
    return token;
  }

  hasNext(): boolean {
    return this.position < this.tokens.length;
  }

  /** The last token of the stream, used to place end-of-input diagnostics. */
  last(): Token | null {
    return this.tokens[this.tokens.length - 1] ?? null;
  }
}
