import type { Candle, Order, OrderRequest, Side } from '../types';

export interface OrderBook {
  bids: [number, number][];
  asks: [number, number][];
}

export interface PublicTrade {
  id: string;
  price: number;
  amount: number;
  side: Side;
  timestamp: number;
}

/**
 * Exchange connectivity consumed by the core. Every call may reject;
 * callers treat a rejection as "no data" or "order failed".
 */
export interface ExchangeClient {
  readonly name: string;
  fetchOHLCV(symbol: string, timeframe: string, limit?: number): Promise<Candle[]>;
  fetchOrderBook(symbol: string): Promise<OrderBook>;
  fetchRecentTrades(symbol: string): Promise<PublicTrade[]>;
  createOrder(request: OrderRequest): Promise<Order>;
  fetchOrderStatus(orderId: string, symbol: string): Promise<Order>;
  cancelOrder(orderId: string, symbol: string): Promise<void>;
}

/** Exchanges that learn prices from the bus instead of a venue. */
export interface PriceFeedAware {
  updatePrice(symbol: string, price: number): void;
}

export function isPriceFeedAware(exchange: ExchangeClient): exchange is ExchangeClient & PriceFeedAware {
  return 'updatePrice' in exchange && typeof exchange.updatePrice === 'function';
}
