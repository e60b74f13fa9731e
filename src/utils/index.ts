// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  formatError,
  formatErrors,
  formatLocation,
  formatErrorWithColors,
  formatErrorWithSuggestions,
  formatAnyError,
  getErrorSuggestions,
} from './format';
export { highlightSnippet } from './highlight';
export { GrammarError, isGrammarError, errorMessage } from './errors';
export { createLogger, silentLogger, consoleSink, supportsColor } from './log';
export { spanLocation } from './types';
export type { Logger, LoggerOptions, LogSink } from './log';
export type { Location, Position } from './types';
