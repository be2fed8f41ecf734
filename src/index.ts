/**
 * Dividend Recycler CLI
 * v1.0.0 - Profit-taking and dividend reinvestment engine
 *
 * Sells winners, recycles realized profit into a dividend ETF and
 * opens new positions from the screener's top picks.
 *
 * Usage: tsx src/index.ts <command> [options]
 */

import { config } from 'dotenv';
import { join } from 'path';
import { Command } from 'commander';
import { runEngine, type RunOptions } from './commands/run.ts';
import { runSignals } from './commands/signals.ts';
import { runLedger } from './commands/ledger.ts';
import { runPositions } from './commands/positions.ts';
import { logger } from './utils/logger.ts';
import { errorMessage } from './utils/errors.ts';
import type { CommonOptions } from './commands/runtime.ts';

// Credentials come from .env / .env.local in the working directory
config({ path: join(process.cwd(), '.env') });
config({ path: join(process.cwd(), '.env.local') });

const program = new Command();

program
  .name('recycler')
  .description('Profit-taking and dividend reinvestment engine')
  .version('1.0.0');

// ============================================================================
// RUN: One full decision cycle
// ============================================================================
program
  .command('run')
  .description('Sell winners, reinvest profit, buy new top picks')
  .option('--dry-run', 'Read live data but send no orders and save nothing', false)
  .option('-c, --config <path>', 'Path to engine.config.yaml')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: RunOptions) => {
    await runEngine({
      dryRun: opts.dryRun,
      config: opts.config,
      verbose: opts.verbose,
    });
  });

// ============================================================================
// SIGNALS: Preview eligible screener rows
// ============================================================================
program
  .command('signals')
  .description('List top picks with a bullish signal')
  .option('-c, --config <path>', 'Path to engine.config.yaml')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: CommonOptions) => {
    await runSignals({ config: opts.config, verbose: opts.verbose });
  });

// ============================================================================
// LEDGER: Realized profit awaiting reinvestment
// ============================================================================
program
  .command('ledger')
  .description('Show the profit ledger')
  .option('-c, --config <path>', 'Path to engine.config.yaml')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: CommonOptions) => {
    await runLedger({ config: opts.config, verbose: opts.verbose });
  });

// ============================================================================
// POSITIONS: Holdings and pending sells
// ============================================================================
program
  .command('positions')
  .description('Show open positions and which would be sold')
  .option('-c, --config <path>', 'Path to engine.config.yaml')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: CommonOptions) => {
    await runPositions({ config: opts.config, verbose: opts.verbose });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  if (logger.isVerbose() && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
});
