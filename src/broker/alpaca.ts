/**
 * Alpaca Trading API (v2) client
 *
 * Thin REST wrapper over fetch. Numeric fields arrive as strings and
 * are parsed here so the engine only sees numbers.
 */

import type { BrokerCredentials } from '../config/index.ts';
import type {
  OpenOrder,
  OrderRequest,
  OrderSide,
  Position,
} from '../types/index.ts';
import type { Brokerage } from './types.ts';
import { logger } from '../utils/logger.ts';

interface AlpacaAccount {
  buying_power: string;
}

interface AlpacaPosition {
  symbol: string;
  qty: string;
  avg_entry_price: string;
  current_price: string | null;
}

interface AlpacaOrder {
  id: string;
  symbol: string;
  side: string;
  status: string;
}

export class AlpacaApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'AlpacaApiError';
  }
}

function toNumber(value: string | null | undefined, field: string): number {
  const n = Number(value);
  if (value === null || value === undefined || value === '' || !Number.isFinite(n)) {
    throw new Error(`Alpaca returned a non-numeric ${field}: ${String(value)}`);
  }
  return n;
}

function toSide(side: string): OrderSide {
  if (side === 'buy' || side === 'sell') return side;
  throw new Error(`Alpaca returned an unknown order side: ${side}`);
}

export function toPosition(p: AlpacaPosition): Position {
  return {
    symbol: p.symbol,
    quantity: toNumber(p.qty, 'qty'),
    averageEntryPrice: toNumber(p.avg_entry_price, 'avg_entry_price'),
    currentPrice: p.current_price === null ? 0 : toNumber(p.current_price, 'current_price'),
  };
}

export class AlpacaBroker implements Brokerage {
  private readonly baseUrl: string;

  constructor(
    private readonly credentials: BrokerCredentials,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = credentials.baseUrl.replace(/\/+$/, '');
  }

  async getBuyingPower(): Promise<number> {
    const account = await this.request<AlpacaAccount>('GET', '/v2/account');
    return toNumber(account.buying_power, 'buying_power');
  }

  async listPositions(): Promise<Position[]> {
    const positions = await this.request<AlpacaPosition[]>('GET', '/v2/positions');
    return positions.map(toPosition);
  }

  async getPosition(symbol: string): Promise<Position | null> {
    try {
      const position = await this.request<AlpacaPosition>(
        'GET',
        `/v2/positions/${encodeURIComponent(symbol)}`
      );
      return toPosition(position);
    } catch (error) {
      if (error instanceof AlpacaApiError && error.status === 404) return null;
      throw error;
    }
  }

  async listOpenOrders(symbol: string): Promise<OpenOrder[]> {
    const params = new URLSearchParams({ status: 'open', symbols: symbol });
    const orders = await this.request<AlpacaOrder[]>(
      'GET',
      `/v2/orders?${params.toString()}`
    );
    return orders.map((o) => ({
      id: o.id,
      symbol: o.symbol,
      side: toSide(o.side),
      status: o.status,
    }));
  }

  async submitOrder(request: OrderRequest): Promise<string> {
    const body: Record<string, string> =
      request.side === 'buy'
        ? { symbol: request.symbol, notional: request.notional.toFixed(2) }
        : { symbol: request.symbol, qty: String(request.quantity) };

    const order = await this.request<AlpacaOrder>('POST', '/v2/orders', {
      ...body,
      side: request.side,
      type: 'market',
      time_in_force: 'day',
    });
    return order.id;
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    body?: Record<string, string>
  ): Promise<T> {
    logger.debug(`[Alpaca] ${method} ${path}`);

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'APCA-API-KEY-ID': this.credentials.keyId,
        'APCA-API-SECRET-KEY': this.credentials.secretKey,
        Accept: 'application/json',
        ...(body ? { 'Content-Type': 'application/json' } : {}),
      },
      body: body ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      throw new AlpacaApiError(response.status, await readErrorMessage(response));
    }
    return (await response.json()) as T;
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text();
  const fallback = text || `HTTP ${response.status}`;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return fallback;
  }
  if (
    parsed !== null &&
    typeof parsed === 'object' &&
    'message' in parsed &&
    typeof parsed.message === 'string'
  ) {
    return parsed.message;
  }
  return fallback;
}
