import { ExchangeError } from '../errors';
import type { Candle, Order, OrderRequest } from '../types';
import type { ExchangeClient, OrderBook, PriceFeedAware, PublicTrade } from './types';

/**
 * Simulated venue. Market orders fill at the last known price; stop-loss
 * and take-profit legs rest until a price update crosses their trigger.
 * When a resting leg fills, the other pending legs of its OCO group are
 * canceled.
 * Market data is read from `marketData` when given (typically a ccxt
 * client used without credentials).
 */
export class PaperExchange implements ExchangeClient, PriceFeedAware {
  readonly name = 'paper';
  private readonly prices = new Map<string, number>();
  private readonly orders = new Map<string, Order>();
  private sequence = 0;

  constructor(private readonly marketData?: ExchangeClient) {}

  async fetchOHLCV(symbol: string, timeframe: string, limit?: number): Promise<Candle[]> {
    const candles = await this.source('fetchOHLCV').fetchOHLCV(symbol, timeframe, limit);
    const last = candles[candles.length - 1];
    if (last) {
      this.updatePrice(symbol, last.close);
    }
    return candles;
  }

  async fetchOrderBook(symbol: string): Promise<OrderBook> {
    return this.source('fetchOrderBook').fetchOrderBook(symbol);
  }

  async fetchRecentTrades(symbol: string): Promise<PublicTrade[]> {
    return this.source('fetchRecentTrades').fetchRecentTrades(symbol);
  }

  async createOrder(request: OrderRequest): Promise<Order> {
    if (!(request.quantity > 0)) {
      throw new ExchangeError('createOrder', `invalid quantity ${request.quantity}`);
    }

    const id = `paper_${Date.now()}_${++this.sequence}`;
    const timestamp = Date.now();

    if (request.type === 'market') {
      const price = this.prices.get(request.symbol) ?? request.price;
      if (price === undefined || !(price > 0)) {
        throw new ExchangeError('createOrder', `no price for ${request.symbol}`);
      }
      const order: Order = { ...request, id, price, fillPrice: price, status: 'filled', timestamp, filledAt: timestamp };
      this.orders.set(id, order);
      return { ...order };
    }

    if (request.price === undefined || !(request.price > 0)) {
      throw new ExchangeError('createOrder', `${request.type} order needs a trigger price`);
    }
    const order: Order = { ...request, id, price: request.price, status: 'pending', timestamp };
    this.orders.set(id, order);
    return { ...order };
  }

  async fetchOrderStatus(orderId: string): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new ExchangeError('fetchOrderStatus', `unknown order ${orderId}`);
    }
    return { ...order };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new ExchangeError('cancelOrder', `unknown order ${orderId}`);
    }
    if (order.status === 'pending') {
      order.status = 'canceled';
    }
  }

  updatePrice(symbol: string, price: number): void {
    if (!(price > 0)) return;
    this.prices.set(symbol, price);

    for (const order of this.orders.values()) {
      if (order.symbol !== symbol || order.status !== 'pending') continue;
      if (this.triggered(order, price)) {
        order.status = 'filled';
        order.fillPrice = price;
        order.filledAt = Date.now();
        this.cancelSiblings(order);
      }
    }
  }

  lastPrice(symbol: string): number | undefined {
    return this.prices.get(symbol);
  }

  private triggered(order: Order, price: number): boolean {
    // A SELL exit protects a long, a BUY exit protects a short.
    switch (order.type) {
      case 'stop_loss':
        return order.side === 'SELL' ? price <= order.price : price >= order.price;
      case 'take_profit':
        return order.side === 'SELL' ? price >= order.price : price <= order.price;
      default:
        return false;
    }
  }

  private cancelSiblings(filled: Order): void {
    if (filled.ocoGroup === undefined) return;
    for (const order of this.orders.values()) {
      if (order.id !== filled.id && order.ocoGroup === filled.ocoGroup && order.status === 'pending') {
        order.status = 'canceled';
      }
    }
  }

  private source(operation: string): ExchangeClient {
    if (!this.marketData) {
      throw new ExchangeError(operation, 'paper exchange has no market data source');
    }
    return this.marketData;
  }
}
