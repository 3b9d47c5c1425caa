import { MessageBus } from '../src/bus/messageBus';
import { LocalTransport } from '../src/bus/transport';
import { parseConfig } from '../src/config';
import type { Config } from '../src/config';
import type { AppContext } from '../src/context';
import { ExchangeError } from '../src/errors';
import type { ExchangeClient, OrderBook, PublicTrade } from '../src/exchange/types';
import { silentLogger } from '../src/logger';
import type { NotificationSink } from '../src/notifications';
import type { Candle, Order, OrderRequest, OrderStatus, OrderType, TradeDecision } from '../src/types';

export function testConfig(overrides: Record<string, unknown> = {}): Config {
  return parseConfig({
    tradingPairs: ['BTC/USDT'],
    initialCapital: 10000,
    rebalanceThreshold: 0.25,
    monitoringInterval: 60,
    riskManagement: { riskTolerance: 0.02, maxPositionSize: 2000, maxDrawdown: 0.2 },
    analysis: { minConfidence: 0.6 },
    execution: { retryAttempts: 3, retryDelay: 0 },
    ...overrides,
  });
}

export function testContext(config: Config = testConfig()): AppContext {
  return { config, logger: silentLogger() };
}

export async function createLocalBus(): Promise<{ bus: MessageBus; transport: LocalTransport }> {
  const transport = new LocalTransport();
  const bus = new MessageBus(transport, silentLogger());
  await bus.connect();
  return { bus, transport };
}

export class RecordingNotifier implements NotificationSink {
  readonly messages: string[] = [];

  async sendMessage(text: string): Promise<void> {
    this.messages.push(text);
  }
}

export function decision(overrides: Partial<TradeDecision> = {}): TradeDecision {
  return {
    id: 'decision-1',
    symbol: 'BTC/USDT',
    direction: 'BUY',
    positionSize: 0.1,
    entryPrice: 30000,
    stopLoss: 29700,
    takeProfit: 30500,
    notional: 3000,
    strategy: 'test',
    timestamp: 1_700_000_000_000,
    ...overrides,
  };
}

export function candle(close: number, index: number, spread = 1, volume = 10): Candle {
  return {
    timestamp: 1_700_000_000_000 + index * 60_000,
    open: close,
    high: close + spread,
    low: close - spread,
    close,
    volume,
  };
}

/**
 * Exchange whose behavior each test scripts: per-type failure counts, the
 * status a new entry comes back with, and status changes set by hand.
 */
export class ScriptedExchange implements ExchangeClient {
  readonly name = 'scripted';
  readonly orders = new Map<string, Order>();
  readonly createCalls: OrderRequest[] = [];
  readonly cancelCalls: string[] = [];
  readonly failures: Partial<Record<OrderType, number>> = {};
  entryStatus: OrderStatus = 'filled';
  candles: Candle[] = [];
  failStatusFetch = false;
  private sequence = 0;

  async fetchOHLCV(): Promise<Candle[]> {
    return this.candles;
  }

  async fetchOrderBook(): Promise<OrderBook> {
    return { bids: [[29990, 1]], asks: [[30010, 1]] };
  }

  async fetchRecentTrades(): Promise<PublicTrade[]> {
    return [];
  }

  async createOrder(request: OrderRequest): Promise<Order> {
    this.createCalls.push(request);
    const remaining = this.failures[request.type] ?? 0;
    if (remaining > 0) {
      this.failures[request.type] = remaining - 1;
      throw new ExchangeError('createOrder', `${request.type} rejected`);
    }

    const id = `${request.type}-${++this.sequence}`;
    const price = request.price ?? 0;
    const filled = request.type === 'market' && this.entryStatus === 'filled';
    const order: Order = {
      id,
      symbol: request.symbol,
      type: request.type,
      side: request.side,
      quantity: request.quantity,
      price,
      fillPrice: filled ? price : undefined,
      status: request.type === 'market' ? this.entryStatus : 'pending',
      timestamp: 1_700_000_000_000,
    };
    this.orders.set(id, order);
    return { ...order };
  }

  async fetchOrderStatus(orderId: string): Promise<Order> {
    if (this.failStatusFetch) {
      throw new ExchangeError('fetchOrderStatus', 'venue unavailable');
    }
    const order = this.orders.get(orderId);
    if (!order) {
      throw new ExchangeError('fetchOrderStatus', `unknown order ${orderId}`);
    }
    return { ...order };
  }

  async cancelOrder(orderId: string): Promise<void> {
    this.cancelCalls.push(orderId);
    const order = this.orders.get(orderId);
    if (order && order.status === 'pending') {
      order.status = 'canceled';
    }
  }

  setStatus(orderId: string, status: OrderStatus, fillPrice?: number, filledAt?: number): void {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`no order ${orderId}`);
    order.status = status;
    if (fillPrice !== undefined) order.fillPrice = fillPrice;
    if (filledAt !== undefined) order.filledAt = filledAt;
  }

  idOf(type: OrderType): string {
    for (const order of this.orders.values()) {
      if (order.type === type) return order.id;
    }
    throw new Error(`no ${type} order placed`);
  }
}
