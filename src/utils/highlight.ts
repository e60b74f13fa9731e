import type { Location } from './types';
import chalk from 'chalk';

/**
 * Render the source line at `location.start` inside a numbered gutter, with
 * `context` lines on either side and a caret run under the span. A span that
 * continues onto later lines is underlined to the end of its first line.
 * Returns an empty string when the line is outside `input`.
 */
export function highlightSnippet(input: string, location: Location, useColor = true, context = 1): string {
  const lines = input.split('\n');
  const { line, column } = location.start;
  if (line < 1 || line > lines.length) return '';

  const first = Math.max(1, line - context);
  const last = Math.min(lines.length, line + context);
  const gutterWidth = String(last).length;
  const gutter = (label: string) => `  ${label.padStart(gutterWidth)} | `;

  const target = lines[line - 1];
  const spanEnd = location.end.line === line ? location.end.column : target.length + 1;
  const carets = '^'.repeat(Math.max(1, spanEnd - column));
  const pointer = gutter('') + ' '.repeat(Math.max(0, column - 1)) + carets;

  const rendered: string[] = [];
  for (let n = first; n <= last; n++) {
    const text = lines[n - 1];
    if (n !== line) {
      rendered.push(useColor ? chalk.dim(gutter(String(n)) + text) : gutter(String(n)) + text);
      continue;
    }
    rendered.push(gutter(String(n)) + (useColor ? chalk.redBright(text) : text));
    rendered.push(useColor ? chalk.yellow(pointer) : pointer);
  }
  return rendered.join('\n');
}
