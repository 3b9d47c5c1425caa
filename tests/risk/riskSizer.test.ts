import { describe, it, expect } from 'vitest';
import { MAX_BALANCE_SHARE, RiskSizer, kelly, kellyFraction, positionNotional } from '../../src/risk/riskSizer';
import type { RiskSizerOptions } from '../../src/risk/riskSizer';
import type { MarketState, TradeSignal } from '../../src/types';

const options: RiskSizerOptions = {
  minConfidence: 0.6,
  maxPositionSize: 2000,
  defaultWinRate: 0.55,
  minTradesForStats: 20,
  stopAtrMultiplier: 3,
  takeProfitAtrMultiplier: 5,
};

function signal(overrides: Partial<TradeSignal> = {}): TradeSignal {
  return {
    symbol: 'BTC/USDT',
    direction: 'BUY',
    confidence: 0.8,
    price: 100,
    strategy: 'test',
    metadata: {},
    timestamp: 0,
    ...overrides,
  };
}

const market: MarketState = { symbol: 'BTC/USDT', price: 100, atr: 2, timestamp: 0 };

describe('Kelly sizing', () => {
  it('sizes win rate 0.6 and reward/risk 2 to a 1000 notional on 10000', () => {
    expect(kelly(0.6, 2)).toBeCloseTo(0.4, 12);
    expect(kellyFraction(0.6, 2)).toBeCloseTo(0.2, 12);
    expect(positionNotional(kellyFraction(0.6, 2), 10000, 2000)).toBeCloseTo(1000, 9);
  });

  it('floors a negative edge at zero', () => {
    expect(kellyFraction(0.2, 1)).toBe(0);
    expect(positionNotional(0, 10000, 2000)).toBe(0);
  });

  it('stays within [0, min(maxPositionSize, 10% of balance)]', () => {
    for (const winRate of [0, 0.3, 0.5, 0.55, 0.7, 0.9, 1]) {
      for (const rewardRisk of [0.5, 1, 5 / 3, 3]) {
        for (const balance of [0, 500, 10000, 1_000_000]) {
          const notional = positionNotional(kellyFraction(winRate, rewardRisk), balance, 2000);
          expect(notional).toBeGreaterThanOrEqual(0);
          expect(notional).toBeLessThanOrEqual(Math.min(2000, MAX_BALANCE_SHARE * Math.max(balance, 0)));
        }
      }
    }
  });
});

describe('RiskSizer.computeExitLevels', () => {
  const sizer = new RiskSizer(options);

  it('places a BUY stop below and target above the entry', () => {
    expect(sizer.computeExitLevels(100, 'BUY', 2)).toEqual({ stopLoss: 94, takeProfit: 110 });
  });

  it('mirrors the levels for a SELL', () => {
    expect(sizer.computeExitLevels(100, 'SELL', 2)).toEqual({ stopLoss: 106, takeProfit: 90 });
  });

  it('rejects a missing, NaN or non-positive ATR', () => {
    expect(sizer.computeExitLevels(100, 'BUY', undefined)).toBeNull();
    expect(sizer.computeExitLevels(100, 'BUY', Number.NaN)).toBeNull();
    expect(sizer.computeExitLevels(100, 'BUY', 0)).toBeNull();
  });
});

describe('RiskSizer.evaluate', () => {
  const sizer = new RiskSizer(options);
  const account = { availableBalance: 10000, winRate: 0, closedTrades: 0 };

  it('rejects signals below the minimum confidence', () => {
    const result = sizer.evaluate(signal({ confidence: 0.5 }), market, account);
    expect(result.accepted).toBe(false);
  });

  it('rejects when ATR is unavailable', () => {
    const result = sizer.evaluate(signal(), { ...market, atr: undefined }, account);
    expect(result).toEqual({ accepted: false, reason: 'ATR unavailable for BTC/USDT' });
  });

  it('uses the default win rate until enough trades closed', () => {
    // 0.55 - 0.45 / (5/3) = 0.28, half 0.14 -> 1400, capped at 10% of 10000
    const result = sizer.evaluate(signal(), market, account);
    if (!result.accepted) throw new Error(result.reason);
    expect(result.decision.notional).toBeCloseTo(1000, 9);
    expect(result.decision.positionSize).toBeCloseTo(10, 9);
    expect(result.decision).toMatchObject({ direction: 'BUY', entryPrice: 100, stopLoss: 94, takeProfit: 110 });
  });

  it('switches to the ledger win rate and rejects a losing record', () => {
    const result = sizer.evaluate(signal(), market, { availableBalance: 10000, winRate: 0.3, closedTrades: 25 });
    expect(result.accepted).toBe(false);
  });

  it('normalizes the signal direction', () => {
    const result = sizer.evaluate(signal({ direction: 'SELL' }), market, account);
    if (!result.accepted) throw new Error(result.reason);
    expect(result.decision.direction).toBe('SELL');
    expect(result.decision.stopLoss).toBe(106);
  });
});
