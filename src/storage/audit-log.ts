/**
 * Order Audit Log
 *
 * Append-only record of every order attempt, one worksheet row each:
 * timestamp | symbol | side | notional | price | order id | success/fail | error
 */

import { format } from 'date-fns';
import type { OrderAttempt } from '../types/index.ts';
import type { CellValue, Worksheet } from './worksheet.ts';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';

export interface AuditLog {
  append(attempt: OrderAttempt): Promise<void>;
}

export function formatTimestamp(date: Date): string {
  return format(date, "yyyy-MM-dd'T'HH:mm:ss");
}

export function toAuditRow(attempt: OrderAttempt): CellValue[] {
  return [
    formatTimestamp(attempt.timestamp),
    attempt.symbol,
    attempt.side,
    attempt.notionalAmount ?? '',
    attempt.price ?? '',
    attempt.orderId ?? '',
    attempt.succeeded ? 'success' : 'fail',
    attempt.errorMessage ?? '',
  ];
}

export class WorksheetAuditLog implements AuditLog {
  constructor(private readonly sheet: Worksheet) {}

  /**
   * A failed append is reported but never interrupts the run: the order
   * it describes has already been sent.
   */
  async append(attempt: OrderAttempt): Promise<void> {
    try {
      await this.sheet.appendRow(toAuditRow(attempt));
    } catch (error) {
      logger.error(
        `Could not log ${attempt.side} ${attempt.symbol}: ${errorMessage(error)}`
      );
    }
  }
}
