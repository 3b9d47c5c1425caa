import { afterEach, describe, expect, it } from 'vitest';
import { LocalTransport } from '../src/bus/transport';
import { createSystem } from '../src/system';
import type { TradingSystem } from '../src/system';
import { sleep } from '../src/utils/async';
import { RecordingNotifier, ScriptedExchange, candle, testConfig, testContext } from './helpers';

async function eventually(check: () => boolean, system: TradingSystem): Promise<void> {
  for (let i = 0; i < 200 && !check(); i++) {
    await system.bus.drain();
    await sleep(5);
  }
}

describe('createSystem', () => {
  let system: TradingSystem | null = null;

  afterEach(async () => {
    if (system) {
      await system.supervisor.shutdown('test finished');
      await system.bus.close();
      system = null;
    }
  });

  it('registers and starts every agent', async () => {
    const notifier = new RecordingNotifier();
    system = createSystem(testContext(), {
      transport: new LocalTransport(),
      exchange: new ScriptedExchange(),
      notifier,
    });
    await system.bus.connect();
    await system.supervisor.start();

    expect(system.supervisor.statusReport().agents.map((agent) => agent.name)).toEqual([
      'portfolio',
      'execution',
      'risk-manager',
      'market-analyst',
      'data-collector',
    ]);
    expect(notifier.messages).toEqual(['🚀 System started with 5 agents']);
  });

  it('carries a signal from market data through to a ledger position', async () => {
    const exchange = new ScriptedExchange();
    const closes = Array.from({ length: 29 }, (_, i) => 100 - i);
    closes.push(40);
    exchange.candles = closes.map((close, i) => candle(close, i));
    const config = testConfig({
      riskManagement: { riskTolerance: 0.05, maxPositionSize: 2000, maxDrawdown: 0.2 },
    });
    const current = createSystem(testContext(config), {
      transport: new LocalTransport(),
      exchange,
      notifier: new RecordingNotifier(),
    });
    system = current;
    await current.bus.connect();
    await current.supervisor.start();

    await eventually(() => current.ledger.getPosition('BTC/USDT') !== undefined, current);

    // half-Kelly 0.14 capped at 10% of 10000 buys 1000 / 40
    expect(current.ledger.getPosition('BTC/USDT')).toMatchObject({ quantity: 25, entryPrice: 40 });
    expect(current.ledger.getState().availableBalance).toBeCloseTo(9000, 9);
    expect(exchange.createCalls.map((call) => call.type)).toEqual(['market', 'stop_loss', 'take_profit']);
    expect(current.pipeline.getBrackets().map((bracket) => bracket.state)).toEqual(['filled']);
  });

  it('holds a single position when two signals arrive under a one-position limit', async () => {
    const exchange = new ScriptedExchange();
    const config = testConfig({
      riskManagement: { riskTolerance: 0.02, maxPositionSize: 2000, maxDrawdown: 0.2, maxPositions: 1 },
    });
    const current = createSystem(testContext(config), {
      transport: new LocalTransport(),
      exchange,
      notifier: new RecordingNotifier(),
    });
    system = current;
    await current.bus.connect();
    await current.supervisor.start();

    const pairs: [string, number][] = [
      ['BTC/USDT', 30000],
      ['ETH/USDT', 2000],
    ];
    for (const [symbol, price] of pairs) {
      current.bus.publish('trading_signals', {
        signal: {
          symbol,
          direction: 'BUY',
          confidence: 0.9,
          price,
          strategy: 'trend_following',
          metadata: {},
          timestamp: 1_700_000_000_000,
        },
        market: { symbol, price, atr: 1, timestamp: 1_700_000_000_000 },
      });
    }

    await eventually(() => current.ledger.getPosition('BTC/USDT') !== undefined, current);
    await current.bus.drain();

    expect(current.bus.history('trade_decisions').map((envelope) => envelope.payload.symbol)).toEqual(['BTC/USDT']);
    expect(Object.keys(current.ledger.getState().positions)).toEqual(['BTC/USDT']);
    expect(exchange.createCalls.filter((call) => call.type === 'market')).toHaveLength(1);
    expect(current.ledger.getPendingDecisions()).toEqual([]);
  });
});
