import type { Brokerage } from '../broker/types.ts';
import type { EngineConfig } from '../config/index.ts';
import type { AuditLog } from '../storage/audit-log.ts';
import type {
  OrderAttempt,
  OrderPurpose,
  OrderRequest,
  SubmitResult,
} from '../types/index.ts';
import { logger } from '../utils/logger.ts';
import type { OrderGateway } from './order-gateway.ts';

/**
 * Collaborators shared by the engine steps
 */
export interface StepContext {
  config: EngineConfig;
  broker: Brokerage;
  gateway: OrderGateway;
  auditLog: AuditLog;
  now: () => Date;
}

export function toOrderAttempt(
  request: OrderRequest,
  result: SubmitResult,
  purpose: OrderPurpose,
  timestamp: Date,
  price?: number
): OrderAttempt {
  return {
    symbol: request.symbol,
    side: request.side,
    purpose,
    ...(request.side === 'buy'
      ? { notionalAmount: request.notional }
      : { quantity: request.quantity }),
    ...(price !== undefined ? { price } : {}),
    ...(result.ok
      ? { orderId: result.orderId, succeeded: true }
      : { errorMessage: result.error, succeeded: false }),
    timestamp,
  };
}

/**
 * Submit through the gateway, then log the attempt whatever the outcome
 */
export async function submitAndRecord(
  ctx: StepContext,
  request: OrderRequest,
  purpose: OrderPurpose,
  price?: number
): Promise<OrderAttempt> {
  const result = await ctx.gateway.submit(request);
  const attempt = toOrderAttempt(request, result, purpose, ctx.now(), price);

  logger.order(attempt);
  await ctx.auditLog.append(attempt);
  return attempt;
}
