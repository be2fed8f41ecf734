import type { EngineConfig } from './index.ts';

/**
 * Default engine settings
 *
 * - Winners are sold at +5% over average entry
 * - Each new position is 5% of buying power at the start of the run
 * - Realized profit is recycled into VIG once at least $1 has accrued
 *   (the broker's minimum notional order)
 */
export const defaultEngineConfig: EngineConfig = {
  dividendSymbol: 'VIG',
  profitTarget: 0.05,
  sizingFraction: 0.05,
  minimumReinvestThreshold: 1.0,
  orderDelayMs: 2000,
  sheets: {
    screener: 'screener',
    log: 'log',
  },
  brokerBaseUrl: 'https://api.alpaca.markets',
};

export const LEDGER_SENTINEL_KEY = 'VIG_FUNDS';
