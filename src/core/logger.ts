/**
 * Logger
 *
 * Console logging with a bracketed tag prefix, coloured with chalk.
 * Debug lines are only printed in verbose mode.
 */

import chalk from 'chalk';

export interface BootstrapLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  tag?: string;
  verbose?: boolean;
}

export class ConsoleLogger implements BootstrapLogger {
  private readonly prefix: string;
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = `[${options.tag ?? 'Bootstrap'}]`;
    this.verbose = options.verbose ?? false;
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.log(chalk.gray(`${this.prefix} ${message}`));
  }

  info(message: string): void {
    console.log(`${chalk.cyan(this.prefix)} ${message}`);
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`${this.prefix} ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`${this.prefix} ${message}`));
  }
}

/**
 * Logger that drops everything (tests, library use)
 */
export const silentLogger: BootstrapLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
