/**
 * Alpaca client tests - fetch is stubbed, nothing leaves the process
 */
import { describe, test, expect, vi, type Mock } from 'vitest';
import { AlpacaApiError, AlpacaBroker } from '../src/broker/alpaca.ts';
import { hasOpenBuyOrder } from '../src/broker/types.ts';

const CREDENTIALS = {
  keyId: 'test-key',
  secretKey: 'test-secret',
  baseUrl: 'https://broker.test/',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function brokerWith(...responses: Response[]) {
  const fetchMock = vi.fn<typeof fetch>();
  for (const response of responses) fetchMock.mockResolvedValueOnce(response);
  return { broker: new AlpacaBroker(CREDENTIALS, fetchMock), fetchMock };
}

function requestOf(
  fetchMock: Mock<typeof fetch>,
  call = 0
): { url: string; init: RequestInit } {
  const args = fetchMock.mock.calls[call];
  return { url: String(args?.[0]), init: args?.[1] ?? {} };
}

describe('AlpacaBroker', () => {
  test('reads buying power with key headers', async () => {
    const { broker, fetchMock } = brokerWith(jsonResponse({ buying_power: '1523.40' }));

    expect(await broker.getBuyingPower()).toBe(1523.4);

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://broker.test/v2/account');
    expect(init.method).toBe('GET');
    expect(init.headers).toMatchObject({
      'APCA-API-KEY-ID': 'test-key',
      'APCA-API-SECRET-KEY': 'test-secret',
    });
  });

  test('maps positions to numbers', async () => {
    const { broker } = brokerWith(
      jsonResponse([
        { symbol: 'XYZ', qty: '10', avg_entry_price: '100.00', current_price: '106.00' },
        { symbol: 'VIG', qty: '0.5123', avg_entry_price: '180.2', current_price: null },
      ])
    );

    expect(await broker.listPositions()).toEqual([
      { symbol: 'XYZ', quantity: 10, averageEntryPrice: 100, currentPrice: 106 },
      { symbol: 'VIG', quantity: 0.5123, averageEntryPrice: 180.2, currentPrice: 0 },
    ]);
  });

  test('a symbol that is not held has no position', async () => {
    const { broker, fetchMock } = brokerWith(
      jsonResponse({ code: 40410000, message: 'position does not exist' }, 404)
    );

    expect(await broker.getPosition('BRK.B')).toBeNull();
    expect(requestOf(fetchMock).url).toBe('https://broker.test/v2/positions/BRK.B');
  });

  test('other position errors are raised', async () => {
    const { broker } = brokerWith(jsonResponse({ message: 'forbidden' }, 403));

    await expect(broker.getPosition('ABC')).rejects.toThrow('forbidden');
  });

  test('lists open orders for one symbol', async () => {
    const { broker, fetchMock } = brokerWith(
      jsonResponse([
        { id: 'o-1', symbol: 'VIG', side: 'buy', status: 'accepted' },
        { id: 'o-2', symbol: 'VIG', side: 'sell', status: 'new' },
      ])
    );

    const orders = await broker.listOpenOrders('VIG');

    expect(requestOf(fetchMock).url).toBe(
      'https://broker.test/v2/orders?status=open&symbols=VIG'
    );
    expect(orders).toEqual([
      { id: 'o-1', symbol: 'VIG', side: 'buy', status: 'accepted' },
      { id: 'o-2', symbol: 'VIG', side: 'sell', status: 'new' },
    ]);
  });

  test('submits a notional market buy for the day', async () => {
    const { broker, fetchMock } = brokerWith(jsonResponse({ id: 'ord-77', symbol: 'ABC', side: 'buy', status: 'accepted' }));

    const id = await broker.submitOrder({ side: 'buy', symbol: 'ABC', notional: 50 });

    expect(id).toBe('ord-77');
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://broker.test/v2/orders');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      symbol: 'ABC',
      notional: '50.00',
      side: 'buy',
      type: 'market',
      time_in_force: 'day',
    });
  });

  test('submits a quantity market sell', async () => {
    const { broker, fetchMock } = brokerWith(jsonResponse({ id: 'ord-78', symbol: 'XYZ', side: 'sell', status: 'accepted' }));

    await broker.submitOrder({ side: 'sell', symbol: 'XYZ', quantity: 2.5 });

    expect(JSON.parse(String(requestOf(fetchMock).init.body))).toEqual({
      symbol: 'XYZ',
      qty: '2.5',
      side: 'sell',
      type: 'market',
      time_in_force: 'day',
    });
  });

  test('a rejected order carries the broker message and status', async () => {
    const { broker } = brokerWith(
      jsonResponse({ code: 40310000, message: 'insufficient buying power' }, 403)
    );

    const error = await broker
      .submitOrder({ side: 'buy', symbol: 'ABC', notional: 50 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AlpacaApiError);
    expect(error).toMatchObject({ status: 403, message: 'insufficient buying power' });
  });

  test('a non-JSON error body is used as the message', async () => {
    const { broker } = brokerWith(new Response('Bad Gateway', { status: 502 }));

    await expect(broker.getBuyingPower()).rejects.toThrow('Bad Gateway');
  });

  test('a malformed buying power is an error', async () => {
    const { broker } = brokerWith(jsonResponse({ buying_power: 'n/a' }));

    await expect(broker.getBuyingPower()).rejects.toThrow(
      'Alpaca returned a non-numeric buying_power: n/a'
    );
  });
});

describe('hasOpenBuyOrder', () => {
  test('only buy orders count', async () => {
    const { broker } = brokerWith(
      jsonResponse([{ id: 'o-2', symbol: 'VIG', side: 'sell', status: 'new' }]),
      jsonResponse([{ id: 'o-3', symbol: 'VIG', side: 'buy', status: 'new' }])
    );

    expect(await hasOpenBuyOrder(broker, 'VIG')).toBe(false);
    expect(await hasOpenBuyOrder(broker, 'VIG')).toBe(true);
  });
});
