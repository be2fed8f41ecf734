/**
 * Dividend Recycler Types
 *
 * Core types shared by the decision engine, the brokerage adapters
 * and the worksheet-backed storage.
 */

// ============================================================================
// MARKET & ACCOUNT
// ============================================================================

export type OrderSide = 'buy' | 'sell';

/**
 * Candidate symbol surfaced by the screener sheet
 */
export interface Signal {
  symbol: string;
  referencePrice?: number;
}

/**
 * Held position as reported by the brokerage
 */
export interface Position {
  symbol: string;
  quantity: number;
  averageEntryPrice: number;
  currentPrice: number;
}

export interface OpenOrder {
  id: string;
  symbol: string;
  side: OrderSide;
  status: string;
}

export interface AccountSnapshot {
  buyingPower: number;
  positions: Position[];
}

// ============================================================================
// ORDERS
// ============================================================================

/**
 * Market order, day time-in-force. Buys are sized by notional,
 * sells by share quantity.
 */
export type OrderRequest =
  | { side: 'buy'; symbol: string; notional: number }
  | { side: 'sell'; symbol: string; quantity: number };

export type SubmitResult =
  | { ok: true; orderId: string }
  | { ok: false; error: string };

export type OrderPurpose = 'liquidation' | 'reinvestment' | 'acquisition';

/**
 * One record per order submission, successful or not.
 * Exactly one of notionalAmount / quantity is set.
 */
export interface OrderAttempt {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly purpose: OrderPurpose;
  readonly notionalAmount?: number;
  readonly quantity?: number;
  readonly price?: number;
  readonly orderId?: string;
  readonly succeeded: boolean;
  readonly errorMessage?: string;
  readonly timestamp: Date;
}

// ============================================================================
// RUN RESULTS
// ============================================================================

export type SkipReason =
  | 'invalid_symbol'
  | 'dividend_symbol'
  | 'invalid_notional'
  | 'already_held'
  | 'open_buy_order'
  | 'duplicate_signal';

export interface SkippedCandidate {
  symbol: string;
  reason: SkipReason;
}

export type ReinvestmentOutcome =
  | { status: 'below_threshold' }
  | { status: 'open_order_pending' }
  | { status: 'submitted'; attempt: OrderAttempt };

export interface RunSummary {
  buyingPower: number;
  ledgerBefore: number;
  ledgerAfter: number;
  liquidations: OrderAttempt[];
  reinvestment: ReinvestmentOutcome;
  signals: Signal[];
  acquisitions: OrderAttempt[];
  skipped: SkippedCandidate[];
}
