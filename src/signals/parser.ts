/**
 * Screener Sheet Parser
 *
 * Turns raw screener rows into Signals. Columns are found by header
 * name, so the sheet's column order does not matter.
 */

import type { Signal } from '../types/index.ts';

export const SCREENER_COLUMNS = {
  topPick: 'TopPick',
  bullish: 'Bullish Signal',
  ticker: 'Ticker',
  price: 'Price',
} as const;

export const BULLISH_MARKER = '✅';

interface ColumnIndexes {
  topPick: number;
  bullish: number;
  ticker: number;
  price: number;
}

function locateColumns(header: string[]): ColumnIndexes | null {
  const find = (name: string) => header.findIndex((h) => h.trim() === name);

  const topPick = find(SCREENER_COLUMNS.topPick);
  const bullish = find(SCREENER_COLUMNS.bullish);
  const ticker = find(SCREENER_COLUMNS.ticker);
  const price = find(SCREENER_COLUMNS.price);

  if (topPick === -1 || bullish === -1 || ticker === -1 || price === -1) {
    return null;
  }
  return { topPick, bullish, ticker, price };
}

/**
 * Parse a price cell such as "12.50", "$1,204.10" or "". Blank or
 * unparsable cells give undefined.
 */
export function parsePrice(raw: string): number | undefined {
  const cleaned = raw.trim().replace(/^\$/, '').replace(/,/g, '');
  if (!cleaned) return undefined;

  const price = Number(cleaned);
  return Number.isFinite(price) ? price : undefined;
}

export function isEligibleRow(topPick: string, bullish: string): boolean {
  return (
    topPick.trim().toUpperCase().startsWith('TOP') &&
    bullish.trim() === BULLISH_MARKER
  );
}

/**
 * Eligible signals, in sheet order. Returns [] when a required column
 * is missing.
 */
export function parseSignalRows(rows: string[][]): Signal[] {
  const [header, ...body] = rows;
  if (!header) return [];

  const columns = locateColumns(header);
  if (!columns) return [];

  const signals: Signal[] = [];
  for (const row of body) {
    const cell = (index: number) => row[index] ?? '';

    if (!isEligibleRow(cell(columns.topPick), cell(columns.bullish))) continue;

    const signal: Signal = { symbol: cell(columns.ticker).trim().toUpperCase() };
    const price = parsePrice(cell(columns.price));
    if (price !== undefined) signal.referencePrice = price;

    signals.push(signal);
  }
  return signals;
}
