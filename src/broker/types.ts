import type {
  OpenOrder,
  OrderRequest,
  Position,
} from '../types/index.ts';

/**
 * Brokerage account operations used by the engine. Every method may
 * throw; the engine decides which failures are fatal.
 */
export interface Brokerage {
  getBuyingPower(): Promise<number>;
  listPositions(): Promise<Position[]>;
  /** null when the symbol is not held */
  getPosition(symbol: string): Promise<Position | null>;
  listOpenOrders(symbol: string): Promise<OpenOrder[]>;
  /** Returns the broker's order id */
  submitOrder(request: OrderRequest): Promise<string>;
}

export async function hasOpenBuyOrder(
  broker: Brokerage,
  symbol: string
): Promise<boolean> {
  const orders = await broker.listOpenOrders(symbol);
  return orders.some((o) => o.side === 'buy' && o.symbol === symbol);
}
