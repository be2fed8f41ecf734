/**
 * Profit ledger persistence
 *
 * The ledger is a sentinel row in the log worksheet: the key in
 * column 1, the accumulated funds in column 2.
 */

import { LEDGER_SENTINEL_KEY } from '../config/defaults.ts';
import { roundToCents } from '../utils/money.ts';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';
import type { Worksheet } from './worksheet.ts';

export interface LedgerStore {
  read(): Promise<number>;
  write(funds: number): Promise<void>;
}

function findSentinelRow(rows: string[][], key: string): number {
  return rows.findIndex((row) => row.length >= 2 && row[0] === key);
}

export class WorksheetLedgerStore implements LedgerStore {
  constructor(
    private readonly sheet: Worksheet,
    private readonly key: string = LEDGER_SENTINEL_KEY
  ) {}

  /**
   * Stored funds, or 0 when the row is missing, unreadable or the
   * sheet cannot be read.
   */
  async read(): Promise<number> {
    let rows: string[][];
    try {
      rows = await this.sheet.getAllValues();
    } catch (error) {
      logger.warn(`Ledger unreadable, assuming $0.00: ${errorMessage(error)}`);
      return 0;
    }

    const index = findSentinelRow(rows, this.key);
    if (index === -1) return 0;

    const funds = Number((rows[index]?.[1] ?? '').trim());
    if (!Number.isFinite(funds) || funds < 0) {
      logger.warn(`Ledger value "${rows[index]?.[1]}" is invalid, assuming $0.00`);
      return 0;
    }
    return funds;
  }

  /**
   * Upsert the sentinel row
   */
  async write(funds: number): Promise<void> {
    const value = roundToCents(funds);
    const rows = await this.sheet.getAllValues();
    const index = findSentinelRow(rows, this.key);

    if (index === -1) {
      await this.sheet.appendRow([this.key, value]);
    } else {
      await this.sheet.updateCell(index + 1, 2, value);
    }
    logger.debug(`Ledger saved: ${value.toFixed(2)}`);
  }
}
