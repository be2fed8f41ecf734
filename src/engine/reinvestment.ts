/**
 * Reinvestment Step
 *
 * Once the ledger reaches the minimum, buys the dividend symbol for the
 * full ledger amount. Skipped while an earlier buy of the dividend
 * symbol is still open.
 */

import type { ReinvestmentOutcome } from '../types/index.ts';
import { hasOpenBuyOrder } from '../broker/types.ts';
import { roundToCents } from '../utils/money.ts';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';
import { ledgerState, resetLedger } from './ledger.ts';
import { submitAndRecord, type StepContext } from './context.ts';

export interface ReinvestmentResult {
  ledger: number;
  outcome: ReinvestmentOutcome;
}

export async function runReinvestment(
  ctx: StepContext,
  ledger: number
): Promise<ReinvestmentResult> {
  const { dividendSymbol, minimumReinvestThreshold } = ctx.config;

  if (ledgerState(ledger, minimumReinvestThreshold) === 'accumulating') {
    logger.debug(
      `Ledger $${ledger.toFixed(2)} below $${minimumReinvestThreshold.toFixed(2)} minimum`
    );
    return { ledger, outcome: { status: 'below_threshold' } };
  }

  let pending: boolean;
  try {
    pending = await hasOpenBuyOrder(ctx.broker, dividendSymbol);
  } catch (error) {
    logger.warn(
      `Could not check open ${dividendSymbol} orders, deferring: ${errorMessage(error)}`
    );
    pending = true;
  }

  if (pending) {
    logger.warn(`Skipped ${dividendSymbol} buy: outstanding buy order exists`);
    return { ledger, outcome: { status: 'open_order_pending' } };
  }

  const notional = roundToCents(ledger);
  logger.info(`Reinvesting $${notional.toFixed(2)} into ${dividendSymbol}`);

  const attempt = await submitAndRecord(
    ctx,
    { side: 'buy', symbol: dividendSymbol, notional },
    'reinvestment'
  );

  return {
    ledger: attempt.succeeded ? resetLedger() : ledger,
    outcome: { status: 'submitted', attempt },
  };
}
