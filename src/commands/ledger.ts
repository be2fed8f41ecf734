/**
 * Ledger Command
 *
 * Shows the realized profit waiting to be reinvested.
 */

import chalk from 'chalk';
import { logger } from '../utils/logger.ts';
import { WorksheetLedgerStore } from '../storage/ledger-store.ts';
import { ledgerState, openLedger } from '../engine/ledger.ts';
import { formatUsd } from '../utils/money.ts';
import { loadConfig, openSheets, type CommonOptions } from './runtime.ts';

export async function runLedger(options: CommonOptions): Promise<void> {
  const config = loadConfig(options);
  const { logSheet } = openSheets(config);

  logger.header('Profit Ledger');
  const funds = openLedger(await new WorksheetLedgerStore(logSheet).read());
  const state = ledgerState(funds, config.minimumReinvestThreshold);

  console.log(chalk.gray('  Accumulated: ') + chalk.green(formatUsd(funds)));
  console.log(
    chalk.gray('  Minimum: ') +
      chalk.white(formatUsd(config.minimumReinvestThreshold))
  );
  console.log(
    chalk.gray('  Status: ') +
      (state === 'reinvest_pending'
        ? chalk.cyan(`next run buys ${config.dividendSymbol}`)
        : chalk.white('accumulating'))
  );
  console.log();
}
