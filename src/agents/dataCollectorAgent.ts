import { atr, volatility } from '../analysis/indicators';
import type { MarketDataMessage } from '../bus/channels';
import type { MessageBus } from '../bus/messageBus';
import type { AppContext } from '../context';
import { errorMessage } from '../errors';
import type { ExchangeClient } from '../exchange/types';
import type { Candle } from '../types';
import { sleep } from '../utils/async';
import { BusAgent } from './busAgent';

/** Polls the exchange for every trading pair and publishes `market_data`. */
export class DataCollectorAgent extends BusAgent {
  private lastSuccess: number | null = null;
  private readonly intervalMs: number;

  constructor(
    private readonly ctx: AppContext,
    bus: MessageBus,
    private readonly exchange: ExchangeClient,
  ) {
    super('data-collector', bus, ctx.logger);
    this.intervalMs = ctx.config.dataCollection.updateInterval * 1000;
  }

  protected attach(): void {
    // Publishes only.
  }

  protected async work(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.collectAll();
      await sleep(this.intervalMs, signal);
    }
  }

  async collectAll(): Promise<number> {
    let published = 0;
    for (const symbol of this.ctx.config.tradingPairs) {
      const message = await this.collect(symbol);
      if (message) {
        this.bus.publish('market_data', message);
        published += 1;
      }
    }
    if (published > 0) {
      this.lastSuccess = Date.now();
    }
    return published;
  }

  /** Null when candles are unavailable; book and trades are optional. */
  async collect(symbol: string): Promise<MarketDataMessage | null> {
    const { timeframe, candleLimit, atrPeriod } = this.ctx.config.analysis;

    let candles: Candle[];
    try {
      candles = await this.exchange.fetchOHLCV(symbol, timeframe, candleLimit);
    } catch (error) {
      this.logger.warn(`No candles for ${symbol} this cycle: ${errorMessage(error)}`);
      return null;
    }
    const last = candles[candles.length - 1];
    if (!last) {
      this.logger.warn(`Exchange returned no candles for ${symbol}`);
      return null;
    }

    const [book, trades] = await Promise.allSettled([
      this.exchange.fetchOrderBook(symbol),
      this.exchange.fetchRecentTrades(symbol),
    ]);
    if (book.status === 'rejected') {
      this.logger.debug(`Order book for ${symbol} unavailable: ${errorMessage(book.reason)}`);
    }
    if (trades.status === 'rejected') {
      this.logger.debug(`Recent trades for ${symbol} unavailable: ${errorMessage(trades.reason)}`);
    }

    const closes = candles.map((candle) => candle.close);
    return {
      symbol,
      state: {
        symbol,
        price: last.close,
        atr: atr(candles, atrPeriod),
        volatility: volatility(closes),
        timestamp: last.timestamp,
      },
      candles,
      orderBook: book.status === 'fulfilled' ? book.value : undefined,
      recentTradeCount: trades.status === 'fulfilled' ? trades.value.length : 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    if (!(await super.healthCheck())) return false;
    if (this.lastSuccess === null) return true;
    return Date.now() - this.lastSuccess <= 3 * this.intervalMs;
  }
}
