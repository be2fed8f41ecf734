/**
 * Acquisition Step
 *
 * Opens a position for each eligible signal, in the order the screener
 * lists them. Every signal gets the same notional: a fixed fraction of
 * the buying power measured at the start of the run.
 */

import type {
  OrderAttempt,
  Signal,
  SkipReason,
  SkippedCandidate,
} from '../types/index.ts';
import { hasOpenBuyOrder } from '../broker/types.ts';
import { roundToCents } from '../utils/money.ts';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';
import { submitAndRecord, type StepContext } from './context.ts';

export const MINIMUM_NOTIONAL = 1.0;

export interface AcquisitionResult {
  attempts: OrderAttempt[];
  skipped: SkippedCandidate[];
}

const SKIP_MESSAGES: Record<SkipReason, string> = {
  invalid_symbol: 'empty symbol',
  dividend_symbol: 'dividend symbol is only bought by reinvestment',
  invalid_notional: 'invalid notional',
  already_held: 'already held in portfolio',
  open_buy_order: 'outstanding buy order exists',
  duplicate_signal: 'already ordered this run',
};

/**
 * Notional per new position, or null when buying power cannot fund
 * the broker's minimum order
 */
export function sizeNotional(
  buyingPower: number,
  sizingFraction: number
): number | null {
  if (!Number.isFinite(buyingPower) || buyingPower <= 0) return null;
  const notional = roundToCents(sizingFraction * buyingPower);
  return notional >= MINIMUM_NOTIONAL ? notional : null;
}

async function isHeld(ctx: StepContext, symbol: string): Promise<boolean> {
  try {
    const position = await ctx.broker.getPosition(symbol);
    return position !== null && position.quantity > 0;
  } catch (error) {
    logger.debug(`Position lookup for ${symbol} failed: ${errorMessage(error)}`);
    return false;
  }
}

async function hasPendingBuy(ctx: StepContext, symbol: string): Promise<boolean> {
  try {
    return await hasOpenBuyOrder(ctx.broker, symbol);
  } catch (error) {
    logger.warn(`Open order lookup for ${symbol} failed: ${errorMessage(error)}`);
    return true;
  }
}

export async function runAcquisition(
  ctx: StepContext,
  signals: Signal[],
  buyingPower: number
): Promise<AcquisitionResult> {
  const { dividendSymbol, sizingFraction } = ctx.config;
  const attempts: OrderAttempt[] = [];
  const skipped: SkippedCandidate[] = [];
  const orderedThisRun = new Set<string>();
  const notional = sizeNotional(buyingPower, sizingFraction);

  const skip = (symbol: string, reason: SkipReason, quiet = false) => {
    skipped.push({ symbol, reason });
    if (!quiet) logger.warn(`Skipping ${symbol}: ${SKIP_MESSAGES[reason]}`);
  };

  for (const signal of signals) {
    const { symbol } = signal;

    if (!symbol) {
      skip(symbol, 'invalid_symbol', true);
      continue;
    }
    if (symbol === dividendSymbol) {
      skip(symbol, 'dividend_symbol', true);
      continue;
    }
    if (notional === null) {
      skip(symbol, 'invalid_notional');
      continue;
    }
    if (orderedThisRun.has(symbol)) {
      skip(symbol, 'duplicate_signal');
      continue;
    }
    if (await isHeld(ctx, symbol)) {
      skip(symbol, 'already_held');
      continue;
    }
    if (await hasPendingBuy(ctx, symbol)) {
      skip(symbol, 'open_buy_order');
      continue;
    }

    logger.info(`Buying ${symbol} for $${notional.toFixed(2)} notional`);
    const attempt = await submitAndRecord(
      ctx,
      { side: 'buy', symbol, notional },
      'acquisition',
      signal.referencePrice
    );
    attempts.push(attempt);
    orderedThisRun.add(symbol);
  }

  return { attempts, skipped };
}
