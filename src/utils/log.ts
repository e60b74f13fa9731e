import { createColors } from 'colorette';

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  error(msg: string): void;
  warn(msg: string): void;
  debug(msg: string): void;
  build(msg: string): void;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  useColor?: boolean;
  sink?: LogSink;
}

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function supportsColor(): boolean {
  return Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;
}

/**
 * Emoji-prefixed leveled logger. `debug` lines only appear in verbose mode.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const sink = options.sink ?? consoleSink;
  const colors = createColors({ useColor: options.useColor ?? supportsColor() });

  return {
    verbose,
    info: (msg) => sink.out(`${colors.blue('ℹ️')}  ${msg}`),
    success: (msg) => sink.out(`${colors.green('✅')} ${msg}`),
    error: (msg) => sink.err(`${colors.red('❌')} ${msg}`),
    warn: (msg) => sink.err(`${colors.yellow('⚠️')}  ${msg}`),
    debug: (msg) => {
      if (verbose) sink.out(colors.dim(`🐛 ${msg}`));
    },
    build: (msg) => sink.out(`${colors.magenta('🔧')} ${msg}`),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  verbose: false,
  info: noop,
  success: noop,
  error: noop,
  warn: noop,
  debug: noop,
  build: noop,
};
