/**
 * Position Liquidation Step
 *
 * Sells the full quantity of every position at or above the profit
 * target and credits the proceeds of each accepted sell to the ledger.
 * The dividend symbol is never sold.
 */

import type { OrderAttempt, Position } from '../types/index.ts';
import { roundToCents } from '../utils/money.ts';
import { logger } from '../utils/logger.ts';
import { creditProceeds } from './ledger.ts';
import { submitAndRecord, type StepContext } from './context.ts';

export interface LiquidationResult {
  ledger: number;
  attempts: OrderAttempt[];
}

/**
 * Fractional gain over average entry, or null when it cannot be computed
 */
export function positionGain(position: Position): number | null {
  if (!(position.averageEntryPrice > 0)) return null;
  return (
    (position.currentPrice - position.averageEntryPrice) /
    position.averageEntryPrice
  );
}

export function shouldLiquidate(
  position: Position,
  profitTarget: number,
  dividendSymbol: string
): boolean {
  if (position.symbol === dividendSymbol) return false;
  if (!(position.quantity > 0)) return false;

  const gain = positionGain(position);
  return gain !== null && gain >= profitTarget;
}

export async function runLiquidation(
  ctx: StepContext,
  positions: Position[],
  ledger: number
): Promise<LiquidationResult> {
  const { profitTarget, dividendSymbol } = ctx.config;
  const attempts: OrderAttempt[] = [];
  let funds = ledger;

  for (const position of positions) {
    if (!shouldLiquidate(position, profitTarget, dividendSymbol)) continue;

    const gain = positionGain(position) ?? 0;
    logger.info(
      `Selling ${position.quantity} ${position.symbol} at ` +
        `$${position.currentPrice.toFixed(2)} (+${(gain * 100).toFixed(2)}%)`
    );

    const attempt = await submitAndRecord(
      ctx,
      { side: 'sell', symbol: position.symbol, quantity: position.quantity },
      'liquidation',
      position.currentPrice
    );
    attempts.push(attempt);

    if (attempt.succeeded) {
      funds = creditProceeds(
        funds,
        roundToCents(position.quantity * position.currentPrice)
      );
    }
  }

  return { ledger: funds, attempts };
}
