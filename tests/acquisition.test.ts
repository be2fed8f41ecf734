/**
 * Tests for the Acquisition Step
 */
import { describe, test, expect } from 'vitest';
import { runAcquisition, sizeNotional } from '../src/engine/acquisition.ts';
import { FakeBroker, createContext, position } from './helpers/fake-broker.ts';

describe('sizeNotional', () => {
  test('is a cent-rounded fraction of buying power', () => {
    expect(sizeNotional(1000, 0.05)).toBe(50);
    expect(sizeNotional(1234.567, 0.05)).toBe(61.73);
  });

  test('is null below the $1 minimum order', () => {
    expect(sizeNotional(19.8, 0.05)).toBeNull();
    expect(sizeNotional(20, 0.05)).toBe(1);
  });

  test('is null without usable buying power', () => {
    expect(sizeNotional(0, 0.05)).toBeNull();
    expect(sizeNotional(-500, 0.05)).toBeNull();
    expect(sizeNotional(Number.NaN, 0.05)).toBeNull();
  });
});

describe('runAcquisition', () => {
  test('buys a top pick for 5% of buying power', async () => {
    const broker = new FakeBroker({ buyingPower: 1000 });
    const { ctx, logSheet } = createContext(broker);

    const result = await runAcquisition(
      ctx,
      [{ symbol: 'ABC', referencePrice: 12.5 }],
      1000
    );

    expect(broker.submitted).toEqual([{ side: 'buy', symbol: 'ABC', notional: 50 }]);
    expect(result.skipped).toEqual([]);
    expect(await logSheet.getAllValues()).toEqual([
      ['2024-03-15T09:30:05', 'ABC', 'buy', '50', '12.5', 'order-1', 'success', ''],
    ]);
  });

  test('does not double down on a held symbol', async () => {
    const broker = new FakeBroker({ positions: [position('ABC', 3, 10, 9)] });
    const { ctx, logSheet } = createContext(broker);

    const result = await runAcquisition(ctx, [{ symbol: 'ABC' }], 1000);

    expect(broker.submitted).toEqual([]);
    expect(result.attempts).toEqual([]);
    expect(result.skipped).toEqual([{ symbol: 'ABC', reason: 'already_held' }]);
    expect(await logSheet.getAllValues()).toEqual([]);
  });

  test('skips a symbol with an open buy order', async () => {
    const broker = new FakeBroker({
      openOrders: [{ id: 'o-9', symbol: 'DEF', side: 'buy', status: 'new' }],
    });
    const { ctx } = createContext(broker);

    const result = await runAcquisition(ctx, [{ symbol: 'DEF' }], 1000);

    expect(broker.submitted).toEqual([]);
    expect(result.skipped).toEqual([{ symbol: 'DEF', reason: 'open_buy_order' }]);
  });

  test('never buys the dividend symbol or an empty ticker', async () => {
    const broker = new FakeBroker();
    const { ctx, logSheet } = createContext(broker);

    const result = await runAcquisition(
      ctx,
      [{ symbol: '' }, { symbol: 'VIG' }, { symbol: 'GHI' }],
      1000
    );

    expect(broker.submitted.map((r) => r.symbol)).toEqual(['GHI']);
    expect(result.skipped).toEqual([
      { symbol: '', reason: 'invalid_symbol' },
      { symbol: 'VIG', reason: 'dividend_symbol' },
    ]);
    expect(await logSheet.getAllValues()).toHaveLength(1);
  });

  test('places nothing when the notional is under $1', async () => {
    const broker = new FakeBroker();
    const { ctx } = createContext(broker);

    const result = await runAcquisition(ctx, [{ symbol: 'ABC' }, { symbol: 'DEF' }], 10);

    expect(broker.submitted).toEqual([]);
    expect(result.skipped.map((s) => s.reason)).toEqual([
      'invalid_notional',
      'invalid_notional',
    ]);
  });

  test('sizes every signal from the same buying power', async () => {
    const broker = new FakeBroker();
    const { ctx } = createContext(broker, { sizingFraction: 0.1 });

    await runAcquisition(
      ctx,
      [{ symbol: 'AAA' }, { symbol: 'BBB' }, { symbol: 'CCC' }],
      500
    );

    expect(broker.submitted).toEqual([
      { side: 'buy', symbol: 'AAA', notional: 50 },
      { side: 'buy', symbol: 'BBB', notional: 50 },
      { side: 'buy', symbol: 'CCC', notional: 50 },
    ]);
  });

  test('a symbol listed twice is ordered once', async () => {
    const broker = new FakeBroker();
    broker.rejectSymbols.set('AAA', 'rejected');
    const { ctx } = createContext(broker);

    const result = await runAcquisition(ctx, [{ symbol: 'AAA' }, { symbol: 'AAA' }], 1000);

    expect(broker.submitted).toHaveLength(1);
    expect(result.skipped).toEqual([{ symbol: 'AAA', reason: 'duplicate_signal' }]);
  });

  test('a failed buy is logged and the run moves on', async () => {
    const broker = new FakeBroker();
    broker.rejectSymbols.set('BAD', 'asset BAD is not tradable');
    const { ctx, logSheet } = createContext(broker);

    const result = await runAcquisition(ctx, [{ symbol: 'BAD' }, { symbol: 'GOOD' }], 1000);

    expect(result.attempts.map((a) => [a.symbol, a.succeeded])).toEqual([
      ['BAD', false],
      ['GOOD', true],
    ]);
    expect(await logSheet.getAllValues()).toEqual([
      ['2024-03-15T09:30:05', 'BAD', 'buy', '50', '', '', 'fail', 'asset BAD is not tradable'],
      ['2024-03-15T09:30:05', 'GOOD', 'buy', '50', '', 'order-1', 'success', ''],
    ]);
  });

  test('a failed position lookup counts as not held', async () => {
    const broker = new FakeBroker();
    broker.failPositionLookup = true;
    const { ctx } = createContext(broker);

    await runAcquisition(ctx, [{ symbol: 'ABC' }], 1000);

    expect(broker.submitted).toEqual([{ side: 'buy', symbol: 'ABC', notional: 50 }]);
  });

  test('a failed open order lookup skips the symbol', async () => {
    const broker = new FakeBroker();
    broker.failOrderLookup = true;
    const { ctx } = createContext(broker);

    const result = await runAcquisition(ctx, [{ symbol: 'ABC' }], 1000);

    expect(broker.submitted).toEqual([]);
    expect(result.skipped).toEqual([{ symbol: 'ABC', reason: 'open_buy_order' }]);
  });

  test('keeps the screener order', async () => {
    const broker = new FakeBroker();
    const { ctx } = createContext(broker);

    await runAcquisition(ctx, [{ symbol: 'ZZZ' }, { symbol: 'AAA' }, { symbol: 'MMM' }], 1000);

    expect(broker.submitted.map((r) => r.symbol)).toEqual(['ZZZ', 'AAA', 'MMM']);
  });
});
