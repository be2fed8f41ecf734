/**
 * Run Command
 *
 * Executes one decision cycle and prints what was sold, reinvested,
 * bought and skipped.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { logger } from '../utils/logger.ts';
import { runDecisionCycle } from '../engine/decision.ts';
import { fixedIntervalThrottle } from '../engine/throttle.ts';
import { WorksheetAuditLog } from '../storage/audit-log.ts';
import { WorksheetLedgerStore } from '../storage/ledger-store.ts';
import { WorksheetSignalSource } from '../signals/source.ts';
import type { OrderAttempt, RunSummary } from '../types/index.ts';
import { formatUsd } from '../utils/money.ts';
import { createRuntime, type CommonOptions } from './runtime.ts';

export interface RunOptions extends CommonOptions {
  dryRun: boolean;
}

function attemptRow(attempt: OrderAttempt): string[] {
  return [
    chalk.bold(attempt.symbol),
    attempt.side === 'sell' ? chalk.magenta('sell') : chalk.cyan('buy'),
    attempt.purpose,
    attempt.notionalAmount !== undefined
      ? formatUsd(attempt.notionalAmount)
      : `${attempt.quantity ?? ''} sh`,
    attempt.succeeded
      ? chalk.green(attempt.orderId ?? 'ok')
      : chalk.red(attempt.errorMessage ?? 'failed'),
  ];
}

export function printSummary(summary: RunSummary): void {
  const attempts = [
    ...summary.liquidations,
    ...(summary.reinvestment.status === 'submitted'
      ? [summary.reinvestment.attempt]
      : []),
    ...summary.acquisitions,
  ];

  logger.header('Run Summary');

  if (attempts.length > 0) {
    const table = new Table({
      head: ['Symbol', 'Side', 'Purpose', 'Size', 'Order'],
      style: { head: ['cyan'], border: ['gray'] },
    });
    for (const attempt of attempts) table.push(attemptRow(attempt));
    console.log(table.toString());
  } else {
    console.log(chalk.gray('  No orders submitted'));
  }

  const failed = attempts.filter((a) => !a.succeeded).length;
  console.log(
    chalk.gray('  Orders: ') +
      chalk.white(`${attempts.length - failed} submitted`) +
      (failed > 0 ? chalk.red(`, ${failed} failed`) : '')
  );
  console.log(
    chalk.gray('  Skipped signals: ') + chalk.white(`${summary.skipped.length}`)
  );
  console.log(
    chalk.gray('  Ledger: ') +
      chalk.white(`${formatUsd(summary.ledgerBefore)} → ${formatUsd(summary.ledgerAfter)}`)
  );
  console.log();
}

export async function runEngine(options: RunOptions): Promise<RunSummary> {
  const runtime = await createRuntime(options);

  logger.header(
    runtime.dryRun ? 'Dividend Recycler (dry run)' : 'Dividend Recycler'
  );

  const summary = await runDecisionCycle({
    config: runtime.config,
    broker: runtime.broker,
    signalSource: new WorksheetSignalSource(runtime.screenerSheet),
    auditLog: new WorksheetAuditLog(runtime.logSheet),
    ledgerStore: new WorksheetLedgerStore(runtime.logSheet),
    throttle: fixedIntervalThrottle(runtime.dryRun ? 0 : runtime.config.orderDelayMs),
  });

  printSummary(summary);
  logger.success(
    runtime.dryRun ? 'Dry run complete, nothing was sent' : 'Done submitting orders'
  );
  return summary;
}
