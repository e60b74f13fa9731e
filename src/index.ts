// src/index.ts
// ============================================
// 🌐 grammarwalk Main API Surface (Public Entry)
// ============================================

// 🧠 Grammar Compilation and Generation
export {
  compileGrammar,
  tryCompileGrammar,
  compileGrammarFromFile,
  loadGrammarFile,
  readGrammarStatements,
  blankCommentLines,
  generate,
  generateSeeded,
  generateWith,
  GrammarCompileError,
  type CompileOptions,
  type CompileResult,
  type CompiledGrammar,
  type GrammarSyntaxError,
} from './grammar/index';

// 📚 Named Grammars
export { GrammarRegistry } from './registry/index';

// 🔤 Lexer and Tokenization
export {
  scan,
  tokenLocation,
  ScanError,
  TokenStream,
  type Token,
  type TokenKind,
  type ScanResult,
} from './lexer/index';

// 📥 Parsing
export {
  GrammarParser,
  ParseError,
  parseTokens,
  parseProbability,
  DEFAULT_PROBABILITY,
  type ParseErrorCode,
  type ParserOptions,
  type ParsedGrammar,
} from './parser/index';

// 🕸️ Graph and Automaton
export {
  SyntaxGraph,
  CompileDefect,
  START_ID,
  toCumulative,
  pickIndex,
  type NodeKind,
  type GraphNode,
  type GraphEdge,
  type RuleEntry,
  type CompileDefectCode,
} from './graph/index';
export { Automaton, freeze, type FrozenNode, type FrozenEdge } from './graph/frozen';

// 🎲 Sampling and Walking
export {
  CharClassSampler,
  DEFAULT_CLASS_LENGTH,
  expandClass,
  symbolWeight,
  type ClassSampler,
  type LengthRange,
} from './charclass/index';
export { XorShiftRandom, createRandom, type RandomSource, type SeedInput } from './random/index';
export {
  Walker,
  walk,
  unescapeLiteral,
  GenerationError,
  type GenerationErrorCode,
  type WalkOutcome,
  type WalkResult,
} from './walker/index';

// 🔍 Inspection
export { graphToDot, automatonToDot, type AutomatonDotOptions } from './debug/graph-dot';

// ⚙️ Configuration
export {
  defaultSettings,
  resolveSettings,
  loadSettingsFile,
  ConfigError,
  type GrammarwalkSettings,
} from './config';

// 🧾 Utilities
export {
  formatError,
  formatErrors,
  formatLocation,
  formatErrorWithColors,
  formatErrorWithSuggestions,
  formatAnyError,
  getErrorSuggestions,
  highlightSnippet,
  GrammarError,
  isGrammarError,
  createLogger,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogSink,
  type Location,
  type Position,
} from './utils/index';

// 🖥️ Command Line
export { runGrammarwalk, parseArgs, type CLIConfig, type CliIO } from './bin/cli-core';
