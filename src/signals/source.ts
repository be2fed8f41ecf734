import type { Signal } from '../types/index.ts';
import type { Worksheet } from '../storage/worksheet.ts';
import { parseSignalRows } from './parser.ts';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';

export interface SignalSource {
  readSignals(): Promise<Signal[]>;
}

/**
 * Reads eligible signals from the screener worksheet. A sheet that
 * cannot be read or lacks the expected columns yields no signals.
 */
export class WorksheetSignalSource implements SignalSource {
  constructor(private readonly sheet: Worksheet) {}

  async readSignals(): Promise<Signal[]> {
    let rows: string[][];
    try {
      rows = await this.sheet.getAllValues();
    } catch (error) {
      logger.warn(`Screener unavailable: ${errorMessage(error)}`);
      return [];
    }

    const signals = parseSignalRows(rows);
    if (signals.length === 0 && rows.length > 1) {
      logger.debug(`No eligible rows in "${this.sheet.name}"`);
    }
    return signals;
  }
}
