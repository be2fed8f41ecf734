import type { Brokerage } from '../broker/types.ts';
import type { OrderRequest, SubmitResult } from '../types/index.ts';
import { errorMessage } from '../utils/errors.ts';
import type { OrderThrottle } from './throttle.ts';

/**
 * Single path for order submission. Never throws and never retries:
 * a rejected order comes back as { ok: false } with the broker's text.
 */
export class OrderGateway {
  constructor(
    private readonly broker: Brokerage,
    private readonly throttle: OrderThrottle
  ) {}

  async submit(request: OrderRequest): Promise<SubmitResult> {
    await this.throttle.acquire();
    try {
      const orderId = await this.broker.submitOrder(request);
      return { ok: true, orderId };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }
}
