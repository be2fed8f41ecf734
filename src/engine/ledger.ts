/**
 * Profit Ledger
 *
 * Realized profit waiting to be recycled into the dividend symbol.
 * Values are plain cent-rounded numbers passed from step to step; the
 * ledger only grows by sell proceeds or resets to zero after a
 * successful reinvestment.
 */

import { roundToCents } from '../utils/money.ts';

export type LedgerState = 'accumulating' | 'reinvest_pending';

export function openLedger(storedFunds: number): number {
  return Number.isFinite(storedFunds) && storedFunds > 0
    ? roundToCents(storedFunds)
    : 0;
}

export function creditProceeds(funds: number, proceeds: number): number {
  if (!Number.isFinite(proceeds) || proceeds <= 0) return funds;
  return roundToCents(funds + roundToCents(proceeds));
}

export function resetLedger(): number {
  return 0;
}

export function ledgerState(funds: number, minimum: number): LedgerState {
  return funds >= minimum ? 'reinvest_pending' : 'accumulating';
}
