/**
 * Positions Command
 *
 * Lists open positions with their gain and whether the next run would
 * sell them.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { logger } from '../utils/logger.ts';
import { positionGain, shouldLiquidate } from '../engine/liquidation.ts';
import { readAccountSnapshot } from '../engine/decision.ts';
import { formatUsd } from '../utils/money.ts';
import { loadConfig, openBroker, type CommonOptions } from './runtime.ts';

export async function runPositions(options: CommonOptions): Promise<void> {
  const config = loadConfig(options);
  const snapshot = await readAccountSnapshot(openBroker(config));

  logger.header('Open Positions');
  logger.info(`Buying power: ${formatUsd(snapshot.buyingPower)}`);

  if (snapshot.positions.length === 0) {
    console.log(chalk.yellow('  No open positions'));
    console.log();
    return;
  }

  const table = new Table({
    head: ['Symbol', 'Qty', 'Entry', 'Current', 'Gain', 'Action'],
    style: { head: ['cyan'], border: ['gray'] },
  });

  for (const position of snapshot.positions) {
    const gain = positionGain(position);
    const gainText = gain === null ? '-' : `${(gain * 100).toFixed(2)}%`;
    const action =
      position.symbol === config.dividendSymbol
        ? chalk.gray('hold (dividend)')
        : shouldLiquidate(position, config.profitTarget, config.dividendSymbol)
          ? chalk.green('sell')
          : chalk.white('hold');

    table.push([
      chalk.bold(position.symbol),
      String(position.quantity),
      formatUsd(position.averageEntryPrice),
      formatUsd(position.currentPrice),
      gain !== null && gain >= 0 ? chalk.green(gainText) : chalk.red(gainText),
      action,
    ]);
  }

  console.log(table.toString());
  console.log();
}
