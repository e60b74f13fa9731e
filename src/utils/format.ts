import type { Location } from './types';
import { GrammarError, errorMessage } from './errors';
import { highlightSnippet } from './highlight';
import { GrammarCompileError } from '../grammar/index';
import * as colors from 'colorette';

export function formatLocation(location: Location): string {
    const { start, end } = location;
    return (start.line === end.line && start.column === end.column)
        ? `Line ${start.line}, Col ${start.column}`
        : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

const SUGGESTIONS: Readonly<Record<string, string>> = {
    'unterminated-delimiter': "Close the literal, annotation or class with its matching ', > or ]",
    'missing-rule-name': 'Start each statement with a rule name, as in Name: ... ;',
    'missing-colon': "Separate the rule name from its body with ':'",
    'missing-semicolon': "End every rule with ';' before the next rule begins",
    'stray-open': "Close every '(' with ')' before the rule's ';'",
    'stray-close': "Remove the ')' or add the '(' it should close",
    'multiple-definitions': 'Merge the bodies into one rule using |',
    'negative-probability': 'Use a weight of zero or more',
    'malformed-probability': 'Write weights as plain decimal numbers, as in <0.25>',
    'undefined-reference': 'Define the rule, or fix the spelling of the reference',
    'unknown-start-rule': 'Start from one of the rules the grammar defines',
    'invalid-budget': 'Pass a token budget that is a whole number of zero or more',
    'invalid-seed': 'Pass a finite seed, or 0 for a random one',
    'unknown-grammar': 'Register the grammar before generating from it',
};

export function getErrorSuggestions(error: GrammarError): string[] {
    const suggestion = SUGGESTIONS[error.code];
    return suggestion ? [suggestion] : [];
}

/**
 * Render one grammar error. The snippet comes from `source`, or from the
 * source the compiler attached to the error.
 */
export function formatErrorWithColors(error: GrammarError, useColors: boolean = true, source?: string): string {
    const c = colors.createColors({ useColor: useColors });
    const parts: string[] = [`${c.red(`❌ ${error.name}:`)} ${error.message}`];

    if (error.location) {
        parts.push(`${c.blue('↪ at')} ${formatLocation(error.location)}`);
    }
    parts.push(`${c.yellow('Code:')} ${error.code}`);

    const input = source ?? error.source;
    if (input !== undefined && error.location) {
        const snippet = highlightSnippet(input, error.location, useColors);
        if (snippet) {
            parts.push('\n' + c.dim('--- Snippet ---') + '\n' + snippet);
        }
    }

    return parts.join('\n');
}

export function formatError(error: GrammarError, source?: string): string {
    return formatErrorWithColors(error, false, source);
}

export function formatErrorWithSuggestions(error: GrammarError, useColors: boolean = true, source?: string): string {
    const baseFormatted = formatErrorWithColors(error, useColors, source);
    const suggestions = getErrorSuggestions(error);

    if (suggestions.length === 0) {
        return baseFormatted;
    }

    const c = colors.createColors({ useColor: useColors });
    const formattedSuggestions = suggestions
        .map((suggestion, index) => `${c.dim(`  ${index + 1}.`)} ${suggestion}`)
        .join('\n');

    return `${baseFormatted}\n${c.cyan('💡 Suggestions:')}\n${formattedSuggestions}`;
}

export function formatErrors(errors: readonly GrammarError[], useColors: boolean = true, source?: string): string {
    if (errors.length === 0) return '';

    const c = colors.createColors({ useColor: useColors });
    const count = `Found ${errors.length} error${errors.length > 1 ? 's' : ''}:`;
    const header = c.red(c.bold(count));

    const formattedErrors = errors.map((error, index) => {
        const errorNum = c.dim(`[${index + 1}/${errors.length}]`);
        return `${errorNum}\n${formatErrorWithSuggestions(error, useColors, source)}`;
    });

    return [header, ...formattedErrors].join('\n\n');
}

/**
 * Format whatever was thrown: a compile failure, a single grammar error, or
 * anything else.
 */
export function formatAnyError(err: unknown, useColors: boolean = true): string {
    if (err instanceof GrammarCompileError) {
        return formatErrors(err.errors, useColors, err.source);
    }
    if (err instanceof GrammarError) {
        return formatErrorWithSuggestions(err, useColors);
    }
    const c = colors.createColors({ useColor: useColors });
    return `${c.red('❌ Error:')} ${errorMessage(err)}`;
}
