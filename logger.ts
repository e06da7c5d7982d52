import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

export interface LogSink {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  success: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('⋯'),
};

export class Logger {
  private verbose: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? console;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string, ...args: unknown[]): void {
    this.sink.log(`${LOG_PREFIXES.info} ${message}`, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    this.sink.log(`${LOG_PREFIXES.success} ${chalk.green(message)}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.sink.log(`${LOG_PREFIXES.warn} ${chalk.yellow(message)}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.sink.error(`${LOG_PREFIXES.error} ${chalk.red(message)}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      this.sink.log(`${LOG_PREFIXES.debug} ${chalk.gray(message)}`, ...args);
    }
  }

  divider(): void {
    this.sink.log(chalk.gray('─'.repeat(60)));
  }

  header(title: string): void {
    this.sink.log('');
    this.sink.log(chalk.bold.cyan(title));
    this.divider();
  }
}

export const logger = new Logger();

export const silentLogger = new Logger({
  sink: { log: () => undefined, error: () => undefined },
});
