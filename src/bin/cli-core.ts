import fs from 'node:fs/promises';
import { createColors } from 'colorette';

import { defaultSettings, loadSettingsFile, resolveSettings, type GrammarwalkSettings } from '../config';
import { automatonToDot } from '../debug/graph-dot';
import { compileGrammarFromFile, generateWith } from '../grammar/index';
import { XorShiftRandom } from '../random/index';
import { errorMessage } from '../utils/errors';
import { formatAnyError } from '../utils/format';
import { createLogger, consoleSink, supportsColor, type LogSink } from '../utils/log';

export interface CliIO extends LogSink {
  writeFile(filePath: string, data: string): Promise<void>;
  /** Color default when neither `--no-color` nor NO_COLOR decides. */
  useColor?: boolean;
}

export const nodeIO: CliIO = {
  ...consoleSink,
  writeFile: (filePath, data) => fs.writeFile(filePath, data, 'utf-8'),
};

export interface CLIConfig {
  grammarPath: string;
  start?: string;
  tokens?: number;
  seed?: bigint;
  count?: number;
  dotFile?: string;
  dotFrom?: string;
  configPath?: string;
  validate: boolean;
  verbose: boolean;
  color: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const VALUE_OPTIONS = ['--start', '--tokens', '--seed', '--count', '--dot', '--dot-from', '--config'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];
const VALUE_OPTION_SET: ReadonlySet<string> = new Set<ValueOption>(VALUE_OPTIONS);

function isValueOption(arg: string): arg is ValueOption {
  return VALUE_OPTION_SET.has(arg);
}

function parseCount(option: string, text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new CliUsageError(`${option} expects a non-negative integer, got '${text}'`);
  }
  return Number(text);
}

export function parseArgs(args: readonly string[]): CLIConfig {
  const config: CLIConfig = {
    grammarPath: '',
    validate: false,
    verbose: false,
    color: true,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (isValueOption(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new CliUsageError(`${arg} expects a value`);
      }
      i++;
      switch (arg) {
        case '--start':
          config.start = value;
          break;
        case '--tokens':
          config.tokens = parseCount(arg, value);
          break;
        case '--seed':
          parseCount(arg, value);
          config.seed = BigInt(value);
          break;
        case '--count':
          config.count = parseCount(arg, value);
          if (config.count < 1) throw new CliUsageError('--count must be at least 1');
          break;
        case '--dot':
          config.dotFile = value;
          break;
        case '--dot-from':
          config.dotFrom = value;
          break;
        case '--config':
          config.configPath = value;
          break;
      }
      continue;
    }

    switch (arg) {
      case '--validate':
        config.validate = true;
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--no-color':
        config.color = false;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        if (arg.startsWith('-') || config.grammarPath) {
          throw new CliUsageError(`Unknown argument: ${arg}`);
        }
        config.grammarPath = arg;
    }
  }

  return config;
}

export function helpText(useColor: boolean): string {
  const c = createColors({ useColor });
  return `
${c.bold('grammarwalk')} - Random text from weighted grammars

${c.bold('USAGE:')}
  grammarwalk <grammar-file> --start <rule> [options]

${c.bold('OPTIONS:')}
  ${c.green('--start <rule>')}          Rule to start generating from
  ${c.green('--tokens <n>')}            Token budget per sample (default: ${defaultSettings.tokenBudget})
  ${c.green('--seed <n>')}              Seed for reproducible output (0 or absent: random)
  ${c.green('--count <n>')}             Number of samples, one per line (default: ${defaultSettings.samples})
  ${c.green('--dot <file>')}            Write the compiled automaton as a DOT graph
  ${c.green('--dot-from <rule>')}       Limit the DOT graph to what a rule reaches
  ${c.green('--validate')}              Only check that the grammar compiles
  ${c.green('--config <file>')}         JSON settings file
  ${c.green('--verbose, -v')}           Enable verbose output
  ${c.green('--no-color')}              Disable colored output
  ${c.green('--help, -h')}              Show this help

${c.bold('EXAMPLES:')}
  grammarwalk names.grammar --start Name --count 5
  grammarwalk names.grammar --start Name --seed 42 --tokens 20
  grammarwalk names.grammar --validate --dot names.dot
`;
}

/**
 * Run the command line with `args` (without the node and script entries).
 * Samples go to `io.out`, one per line; status and errors go to `io.err`.
 * Resolves to the process exit code.
 */
export async function runGrammarwalk(args: readonly string[], io: CliIO = nodeIO): Promise<number> {
  const envColor = io.useColor ?? supportsColor();
  let config: CLIConfig;
  try {
    config = parseArgs(args);
  } catch (err: unknown) {
    const log = createLogger({ useColor: envColor, sink: { out: io.err, err: io.err } });
    log.error(errorMessage(err));
    io.err(helpText(envColor));
    return 1;
  }

  const useColor = envColor && config.color;
  const log = createLogger({ verbose: config.verbose, useColor, sink: { out: io.err, err: io.err } });

  if (config.help) {
    io.out(helpText(useColor));
    return 0;
  }

  if (!config.grammarPath) {
    log.error('Missing grammar file');
    io.err(helpText(useColor));
    return 1;
  }

  try {
    const settings: GrammarwalkSettings = config.configPath
      ? await loadSettingsFile(config.configPath)
      : resolveSettings({});
    if (config.configPath) {
      log.debug(`Loaded settings from ${config.configPath}`);
    }

    log.debug(`Using grammar file: ${config.grammarPath}`);
    const grammar = await compileGrammarFromFile(config.grammarPath, {
      defaultProbability: settings.defaultProbability,
      classLength: settings.classLength,
      logger: log,
    });

    if (config.dotFile) {
      const dot = automatonToDot(grammar.automaton, { from: config.dotFrom });
      await io.writeFile(config.dotFile, dot);
      log.build(`Wrote DOT graph to ${config.dotFile}`);
    }

    if (config.validate) {
      log.success(`Grammar is valid (${grammar.rules.length} rules)`);
      return 0;
    }

    if (config.start === undefined) {
      if (config.dotFile) return 0;
      log.error('Missing --start <rule>');
      return 1;
    }

    const budget = config.tokens ?? settings.tokenBudget;
    const count = config.count ?? settings.samples;
    const random = new XorShiftRandom(config.seed ?? 0);
    log.debug(`Seed: ${random.seed}`);

    for (let i = 0; i < count; i++) {
      const result = generateWith(grammar, config.start, budget, random);
      io.out(result.output);
      log.debug(`Sample ${i + 1}: ${result.tokens} tokens in ${result.steps} steps, stopped on ${result.outcome}`);
    }
    return 0;
  } catch (err: unknown) {
    io.err(formatAnyError(err, useColor));
    return 1;
  }
}
