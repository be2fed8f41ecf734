/**
 * Decision Engine
 *
 * One run, strictly in order:
 *   1. account snapshot (buying power + positions), fatal on failure
 *   2. ledger read
 *   3. liquidation of winners
 *   4. reinvestment of the ledger, including this run's proceeds
 *   5. screener signals
 *   6. acquisition, sized from the buying power read in step 1
 *   7. ledger write, once
 *
 * Nothing is written to the ledger if the run aborts before step 7.
 */

import type { Brokerage } from '../broker/types.ts';
import type { EngineConfig } from '../config/index.ts';
import type { AuditLog } from '../storage/audit-log.ts';
import type { LedgerStore } from '../storage/ledger-store.ts';
import type { SignalSource } from '../signals/source.ts';
import type { AccountSnapshot, RunSummary } from '../types/index.ts';
import { AccountUnavailableError, errorMessage } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { openLedger } from './ledger.ts';
import { OrderGateway } from './order-gateway.ts';
import type { OrderThrottle } from './throttle.ts';
import type { StepContext } from './context.ts';
import { runLiquidation } from './liquidation.ts';
import { runReinvestment } from './reinvestment.ts';
import { runAcquisition } from './acquisition.ts';

export interface DecisionEngineDeps {
  config: EngineConfig;
  broker: Brokerage;
  signalSource: SignalSource;
  auditLog: AuditLog;
  ledgerStore: LedgerStore;
  throttle: OrderThrottle;
  now?: () => Date;
}

export async function readAccountSnapshot(
  broker: Brokerage
): Promise<AccountSnapshot> {
  try {
    const buyingPower = await broker.getBuyingPower();
    const positions = await broker.listPositions();
    return { buyingPower, positions };
  } catch (error) {
    throw new AccountUnavailableError(
      `Account unavailable: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export async function runDecisionCycle(
  deps: DecisionEngineDeps
): Promise<RunSummary> {
  const ctx: StepContext = {
    config: deps.config,
    broker: deps.broker,
    gateway: new OrderGateway(deps.broker, deps.throttle),
    auditLog: deps.auditLog,
    now: deps.now ?? (() => new Date()),
  };

  const snapshot = await readAccountSnapshot(deps.broker);
  logger.info(`Buying power: $${snapshot.buyingPower.toFixed(2)}`);
  logger.info(`Open positions: ${snapshot.positions.length}`);

  const ledgerBefore = openLedger(await deps.ledgerStore.read());
  logger.info(`Profit ledger: $${ledgerBefore.toFixed(2)}`);

  logger.header(`Positions at or above +${(deps.config.profitTarget * 100).toFixed(1)}%`);
  const liquidation = await runLiquidation(ctx, snapshot.positions, ledgerBefore);

  logger.header(`Reinvestment into ${deps.config.dividendSymbol}`);
  const reinvestment = await runReinvestment(ctx, liquidation.ledger);

  const signals = await deps.signalSource.readSignals();
  logger.header(`Signals (${signals.length} eligible)`);
  const acquisition = await runAcquisition(ctx, signals, snapshot.buyingPower);

  await deps.ledgerStore.write(reinvestment.ledger);

  return {
    buyingPower: snapshot.buyingPower,
    ledgerBefore,
    ledgerAfter: reinvestment.ledger,
    liquidations: liquidation.attempts,
    reinvestment: reinvestment.outcome,
    signals,
    acquisitions: acquisition.attempts,
    skipped: acquisition.skipped,
  };
}
