import type { OpenOrder, OrderRequest, Position } from '../types/index.ts';
import type { Brokerage } from './types.ts';
import { logger } from '../utils/logger.ts';

/**
 * Reads from a live brokerage, never sends orders. Submissions succeed
 * with a local id so the rest of the run behaves as it would live.
 */
export class DryRunBroker implements Brokerage {
  private sequence = 0;
  readonly submitted: OrderRequest[] = [];

  constructor(private readonly live: Brokerage) {}

  getBuyingPower(): Promise<number> {
    return this.live.getBuyingPower();
  }

  listPositions(): Promise<Position[]> {
    return this.live.listPositions();
  }

  getPosition(symbol: string): Promise<Position | null> {
    return this.live.getPosition(symbol);
  }

  listOpenOrders(symbol: string): Promise<OpenOrder[]> {
    return this.live.listOpenOrders(symbol);
  }

  async submitOrder(request: OrderRequest): Promise<string> {
    this.sequence++;
    this.submitted.push(request);
    logger.debug(`[DryRun] ${request.side} ${request.symbol} not sent`);
    return `dry-run-${this.sequence}`;
  }
}
