import type { Location } from './types';
import { highlightSnippet } from './highlight';

/**
 * Base class of every error raised while compiling or walking a grammar.
 * `code` is a stable machine-readable identifier; `source` is attached by
 * the compiler so the error can render its own context line.
 */
export class GrammarError<Code extends string = string> extends Error {
  public readonly code: Code;
  public readonly location?: Location;
  public source?: string;

  constructor(message: string, code: Code, location?: Location) {
    super(message);
    this.name = 'GrammarError';
    this.code = code;
    this.location = location;
  }

  get line(): number | undefined {
    return this.location?.start.line;
  }

  get column(): number | undefined {
    return this.location?.start.column;
  }

  toString(): string {
    const start = this.location?.start;
    const where = start ? ` at ${start.line}:${start.column}` : '';
    const header = `${this.name}${where}: ${this.message}`;

    const snippet = this.location && this.source !== undefined
      ? highlightSnippet(this.source, this.location, false, 0)
      : '';
    return snippet ? `${header}\n\n${snippet}` : header;
  }
}

export function isGrammarError(err: unknown): err is GrammarError {
  return err instanceof GrammarError;
}

/**
 * Message of anything thrown. Errors raised by Node's own modules may come
 * from another realm and fail `instanceof Error`, so the shape is checked.
 */
export function errorMessage(err: unknown): string {
  if (typeof err === 'string') return err;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return 'Unknown error';
}
