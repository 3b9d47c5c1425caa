import { Exchange, binance, bybit, kraken, kucoin, okx } from 'ccxt';
import { ExchangeError, errorMessage } from '../errors';
import { SideSchema } from '../types';
import type { Candle, Order, OrderRequest, OrderStatus } from '../types';
import type { ExchangeClient, OrderBook, PublicTrade } from './types';

type ExchangeConstructor = new (userConfig?: Record<string, unknown>) => Exchange;

const EXCHANGES: Record<string, ExchangeConstructor> = {
  binance,
  bybit,
  kraken,
  kucoin,
  okx,
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGES);

export interface CcxtExchangeOptions {
  id: string;
  testnet: boolean;
  apiKey?: string;
  secret?: string;
}

function toStatus(status: string | undefined): OrderStatus {
  switch (status) {
    case 'closed':
      return 'filled';
    case 'canceled':
      return 'canceled';
    case 'expired':
    case 'rejected':
      return 'expired';
    default:
      return 'pending';
  }
}

/**
 * ExchangeClient over a ccxt unified API. Exit legs are sent as reduce-only
 * market orders carrying `stopLossPrice` / `takeProfitPrice`.
 */
export class CcxtExchange implements ExchangeClient {
  readonly name: string;
  private readonly exchange: Exchange;

  constructor(options: CcxtExchangeOptions) {
    const ExchangeClass = EXCHANGES[options.id];
    if (!ExchangeClass) {
      throw new ExchangeError('init', `unsupported exchange '${options.id}' (supported: ${SUPPORTED_EXCHANGES.join(', ')})`);
    }
    this.exchange = new ExchangeClass({
      apiKey: options.apiKey || undefined,
      secret: options.secret || undefined,
      enableRateLimit: true,
    });
    if (options.testnet) {
      this.exchange.setSandboxMode(true);
    }
    this.name = options.id;
  }

  async fetchOHLCV(symbol: string, timeframe: string, limit?: number): Promise<Candle[]> {
    const rows = await this.call('fetchOHLCV', () => this.exchange.fetchOHLCV(symbol, timeframe, undefined, limit));
    return rows.map((row) => {
      const [timestamp, open, high, low, close, volume] = row;
      return {
        timestamp: timestamp ?? 0,
        open: open ?? 0,
        high: high ?? 0,
        low: low ?? 0,
        close: close ?? 0,
        volume: volume ?? 0,
      };
    });
  }

  async fetchOrderBook(symbol: string): Promise<OrderBook> {
    const book = await this.call('fetchOrderBook', () => this.exchange.fetchOrderBook(symbol));
    const level = ([price, amount]: [number | undefined, number | undefined]): [number, number] => [
      price ?? 0,
      amount ?? 0,
    ];
    return { bids: book.bids.map(level), asks: book.asks.map(level) };
  }

  async fetchRecentTrades(symbol: string): Promise<PublicTrade[]> {
    const trades = await this.call('fetchTrades', () => this.exchange.fetchTrades(symbol));
    const result: PublicTrade[] = [];
    for (const trade of trades) {
      const side = SideSchema.safeParse(trade.side);
      if (!side.success) continue;
      result.push({
        id: trade.id ?? '',
        price: trade.price ?? 0,
        amount: trade.amount ?? 0,
        side: side.data,
        timestamp: trade.timestamp ?? 0,
      });
    }
    return result;
  }

  async createOrder(request: OrderRequest): Promise<Order> {
    const side = request.side === 'BUY' ? 'buy' : 'sell';
    const params: Record<string, unknown> = {};
    if (request.type === 'stop_loss') {
      params.stopLossPrice = request.price;
      params.reduceOnly = true;
    } else if (request.type === 'take_profit') {
      params.takeProfitPrice = request.price;
      params.reduceOnly = true;
    }

    const placed = await this.call('createOrder', () =>
      this.exchange.createOrder(request.symbol, 'market', side, request.quantity, undefined, params),
    );
    return {
      id: placed.id,
      symbol: request.symbol,
      type: request.type,
      side: request.side,
      quantity: placed.amount ?? request.quantity,
      price: request.price ?? placed.price ?? 0,
      fillPrice: placed.average ?? undefined,
      status: toStatus(placed.status),
      timestamp: placed.timestamp ?? Date.now(),
    };
  }

  async fetchOrderStatus(orderId: string, symbol: string): Promise<Order> {
    const order = await this.call('fetchOrder', () => this.exchange.fetchOrder(orderId, symbol));
    const side = SideSchema.safeParse(order.side);
    if (!side.success) {
      throw new ExchangeError('fetchOrder', `order ${orderId} has unknown side '${String(order.side)}'`);
    }
    return {
      id: order.id,
      symbol,
      type: order.reduceOnly ? (order.stopLossPrice ? 'stop_loss' : 'take_profit') : 'market',
      side: side.data,
      quantity: order.amount ?? 0,
      price: order.triggerPrice ?? order.price ?? 0,
      fillPrice: order.average ?? undefined,
      status: toStatus(order.status),
      timestamp: order.timestamp ?? Date.now(),
      filledAt: order.lastTradeTimestamp ?? undefined,
    };
  }

  async cancelOrder(orderId: string, symbol: string): Promise<void> {
    await this.call('cancelOrder', () => this.exchange.cancelOrder(orderId, symbol));
  }

  private async call<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new ExchangeError(operation, errorMessage(error));
    }
  }
}
