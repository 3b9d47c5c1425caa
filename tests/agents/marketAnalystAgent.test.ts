import { describe, expect, it } from 'vitest';
import { MarketAnalystAgent } from '../../src/agents/marketAnalystAgent';
import type { SignalStrategy } from '../../src/analysis/strategy';
import type { MarketDataMessage } from '../../src/bus/channels';
import type { TradeSignal } from '../../src/types';
import { candle, createLocalBus, testContext } from '../helpers';

class FixedStrategy implements SignalStrategy {
  readonly name = 'fixed';
  readonly seen: string[] = [];

  constructor(private readonly signals: TradeSignal[]) {}

  evaluate(symbol: string): TradeSignal[] {
    this.seen.push(symbol);
    return this.signals;
  }
}

const market: MarketDataMessage = {
  symbol: 'BTC/USDT',
  state: { symbol: 'BTC/USDT', price: 100, atr: 2, timestamp: 1_700_000_000_000 },
  candles: [candle(100, 0)],
  recentTradeCount: 0,
};

const signal = (direction: 'BUY' | 'SELL'): TradeSignal => ({
  symbol: 'BTC/USDT',
  direction,
  confidence: 0.7,
  price: 100,
  strategy: 'fixed',
  metadata: {},
  timestamp: 1_700_000_000_000,
});

describe('MarketAnalystAgent', () => {
  it('publishes every signal together with the market state', async () => {
    const { bus } = await createLocalBus();
    const agent = new MarketAnalystAgent(testContext(), bus, new FixedStrategy([signal('BUY'), signal('SELL')]));

    agent.analyze(market);
    await bus.drain();

    const published = bus.history('trading_signals').map((envelope) => envelope.payload);
    expect(published.map((message) => message.signal.direction)).toEqual(['BUY', 'SELL']);
    expect(published[0]?.market).toEqual(market.state);
  });

  it('publishes nothing when the strategy is silent', async () => {
    const { bus } = await createLocalBus();
    const agent = new MarketAnalystAgent(testContext(), bus, new FixedStrategy([]));

    agent.analyze(market);
    await bus.drain();

    expect(bus.history('trading_signals')).toEqual([]);
  });

  it('analyzes market data arriving on the bus', async () => {
    const { bus } = await createLocalBus();
    const strategy = new FixedStrategy([signal('BUY')]);
    const agent = new MarketAnalystAgent(testContext(), bus, strategy);
    const controller = new AbortController();
    const running = agent.run(controller.signal);

    bus.publish('market_data', market);
    await bus.drain();

    expect(strategy.seen).toEqual(['BTC/USDT']);
    expect(bus.history('trading_signals')).toHaveLength(1);
    controller.abort();
    await running;
  });
});
