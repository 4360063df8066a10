import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only shown in verbose mode. */
  debug(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger for the CLI. Diagnostics go to stderr so that
 * `--json` output on stdout stays parseable.
 */
export class ConsoleLogger implements Logger {
  private verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.error(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(chalk.dim(message));
    }
  }
}

/** Default for library use. */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}
