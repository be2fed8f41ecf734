/**
 * Signals Command
 *
 * Lists the screener rows that currently qualify as buy signals.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { logger } from '../utils/logger.ts';
import { WorksheetSignalSource } from '../signals/source.ts';
import { formatUsd } from '../utils/money.ts';
import { loadConfig, openSheets, type CommonOptions } from './runtime.ts';

export async function runSignals(options: CommonOptions): Promise<void> {
  const config = loadConfig(options);
  const { screenerSheet } = openSheets(config);

  logger.header(`Eligible signals in "${config.sheets.screener}"`);
  const signals = await new WorksheetSignalSource(screenerSheet).readSignals();

  if (signals.length === 0) {
    console.log(chalk.yellow('  No top picks with a bullish signal'));
    console.log();
    return;
  }

  const table = new Table({
    head: ['#', 'Ticker', 'Price', 'Note'],
    style: { head: ['cyan'], border: ['gray'] },
  });

  signals.forEach((signal, i) => {
    const note = !signal.symbol
      ? chalk.red('missing ticker')
      : signal.symbol === config.dividendSymbol
        ? chalk.gray('reinvestment only')
        : '';
    table.push([
      String(i + 1),
      chalk.bold(signal.symbol || '-'),
      signal.referencePrice !== undefined ? formatUsd(signal.referencePrice) : '-',
      note,
    ]);
  });

  console.log(table.toString());
  console.log();
}
