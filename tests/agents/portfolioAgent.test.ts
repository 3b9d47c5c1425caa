import { describe, expect, it } from 'vitest';
import { PortfolioAgent } from '../../src/agents/portfolioAgent';
import type { MessageBus } from '../../src/bus/messageBus';
import { PortfolioLedger } from '../../src/portfolio/ledger';
import type { ExecutionResult } from '../../src/types';
import { RecordingNotifier, createLocalBus, testConfig, testContext } from '../helpers';

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    orderId: 'o-1',
    bracketId: 'o-1',
    leg: 'entry',
    symbol: 'BTC/USDT',
    side: 'BUY',
    price: 30000,
    quantity: 0.1,
    timestamp: 1_700_000_000_000,
    ...overrides,
  };
}

async function setup(now = new Date('2024-01-01T10:00:00Z')): Promise<{
  bus: MessageBus;
  ledger: PortfolioLedger;
  notifier: RecordingNotifier;
  agent: PortfolioAgent;
}> {
  const { bus } = await createLocalBus();
  const config = testConfig();
  const ledger = new PortfolioLedger({ initialCapital: config.initialCapital, maxPositionWeight: config.rebalanceThreshold });
  const notifier = new RecordingNotifier();
  const agent = new PortfolioAgent(testContext(config), bus, ledger, notifier, now);
  return { bus, ledger, notifier, agent };
}

describe('PortfolioAgent.onFill', () => {
  it('applies the fill and suggests trimming an overweight position', async () => {
    const { bus, ledger, agent } = await setup();

    await agent.onFill(result());
    await bus.drain();

    expect(ledger.getState().availableBalance).toBeCloseTo(7000, 9);
    const [suggestion] = bus.history('rebalance_suggestions');
    expect(suggestion?.payload).toMatchObject({ symbol: 'BTC/USDT', side: 'SELL', targetWeight: 0.25 });
    expect(suggestion?.payload.quantity).toBeCloseTo(500 / 30000, 12);
    expect(suggestion?.payload.currentWeight).toBeCloseTo(0.3, 12);
  });

  it('publishes nothing for a position within its weight', async () => {
    const { bus, agent } = await setup();

    await agent.onFill(result({ quantity: 0.05 }));
    await bus.drain();

    expect(bus.history('rebalance_suggestions')).toEqual([]);
  });

  it('reports a fill the ledger rejects', async () => {
    const { ledger, notifier, agent } = await setup();

    await agent.onFill(result({ price: 0 }));

    expect(ledger.getTradeHistory()).toHaveLength(0);
    expect(notifier.messages).toEqual([
      '❌ Fill o-1 on BTC/USDT rejected: invalid fill for BTC/USDT: price=0 quantity=0.1',
    ]);
  });

  it('alerts on an invariant violation', async () => {
    const { notifier, agent } = await setup();

    await agent.onFill(result({ price: 10000, quantity: 2 }));

    expect(notifier.messages).toEqual(['🚨 Ledger invariant violated: available balance -10000.00 is below -100.00']);
  });
});

describe('PortfolioAgent.rollover', () => {
  it('snapshots the closing UTC day once the date changes', async () => {
    const { ledger, agent } = await setup();

    expect(await agent.rollover(new Date('2024-01-01T23:00:00Z'))).toBe(false);
    expect(await agent.rollover(new Date('2024-01-02T00:00:05Z'))).toBe(true);
    expect(await agent.rollover(new Date('2024-01-02T08:00:00Z'))).toBe(false);

    const snapshots = ledger.getSnapshots();
    expect(snapshots).toHaveLength(1);
    expect(snapshots[0]).toMatchObject({
      date: '2024-01-01',
      equity: 10000,
      timestamp: Date.parse('2024-01-01T23:59:59.999Z'),
    });
  });
});

describe('PortfolioAgent.publishUpdate', () => {
  it('publishes equity, positions and metrics', async () => {
    const { bus, agent } = await setup();
    await agent.onFill(result({ quantity: 0.05 }));

    const update = await agent.publishUpdate();
    await bus.drain();

    expect(update.equity).toBeCloseTo(10000, 9);
    expect(update.positions).toEqual([
      { symbol: 'BTC/USDT', quantity: 0.05, entryPrice: 30000, currentPrice: 30000, unrealizedPnl: 0 },
    ]);
    expect(update.metrics.positionCount).toBe(1);
    expect(bus.history('portfolio_updates')).toHaveLength(1);
  });
});

describe('PortfolioAgent on the bus', () => {
  it('takes fills and marks from its channels until stopped', async () => {
    const { bus, ledger, agent } = await setup();
    const controller = new AbortController();
    const running = agent.run(controller.signal);

    bus.publish('execution_results', result({ quantity: 0.05 }));
    await bus.drain();
    bus.publish('market_data', {
      symbol: 'BTC/USDT',
      state: { symbol: 'BTC/USDT', price: 31000, timestamp: 1_700_000_060_000 },
      candles: [],
      recentTradeCount: 0,
    });
    await bus.drain();

    expect(ledger.getPosition('BTC/USDT')?.unrealizedPnl).toBeCloseTo(50, 9);
    expect(await agent.healthCheck()).toBe(true);

    controller.abort();
    await running;
    expect(await agent.healthCheck()).toBe(false);
    expect(bus.subscriberCount('execution_results')).toBe(0);
  });
});
