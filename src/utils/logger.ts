import chalk from 'chalk';
import type { OrderAttempt } from '../types/index.ts';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  success: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('⋯'),
};

class Logger {
  private verbose = false;

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  info(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.info} ${message}`, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.success} ${chalk.green(message)}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.warn} ${chalk.yellow(message)}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`${LOG_PREFIXES.error} ${chalk.red(message)}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      console.log(`${LOG_PREFIXES.debug} ${chalk.gray(message)}`, ...args);
    }
  }

  order(attempt: OrderAttempt): void {
    const side =
      attempt.side === 'sell' ? chalk.magenta('SELL') : chalk.cyan('BUY ');
    const size =
      attempt.notionalAmount !== undefined
        ? `$${attempt.notionalAmount.toFixed(2)}`
        : `${attempt.quantity ?? 0} sh`;
    const outcome = attempt.succeeded
      ? chalk.green(`submitted ${attempt.orderId ?? ''}`)
      : chalk.red(`failed: ${attempt.errorMessage ?? 'unknown error'}`);
    console.log(
      `  ${side} ${chalk.bold(attempt.symbol.padEnd(6))} ` +
        `${size.padStart(12)}  ${outcome}`
    );
  }

  divider(): void {
    console.log(chalk.gray('─'.repeat(60)));
  }

  header(title: string): void {
    console.log();
    console.log(chalk.bold.cyan(title));
    this.divider();
  }
}

export const logger = new Logger();
