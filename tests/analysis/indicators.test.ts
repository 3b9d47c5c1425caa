import { describe, expect, it } from 'vitest';
import { atr, bollinger, emaSeries, macd, rsi, sma, volatility } from '../../src/analysis/indicators';
import { candle } from '../helpers';

describe('sma', () => {
  it('averages the trailing window', () => {
    expect(sma([1, 2, 3, 4], 2)).toBe(3.5);
    expect(sma([1, 2], 3)).toBeUndefined();
  });
});

describe('emaSeries', () => {
  it('seeds with the first value', () => {
    expect(emaSeries([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });
});

describe('rsi', () => {
  it('uses the average gain over average loss', () => {
    expect(rsi([10, 12, 11, 13], 3)).toBeCloseTo(80, 10);
  });

  it('is 100 for only gains, 0 for only losses and 50 for a flat window', () => {
    expect(rsi([1, 2, 3, 4], 3)).toBe(100);
    expect(rsi([4, 3, 2, 1], 3)).toBe(0);
    expect(rsi([5, 5, 5, 5], 3)).toBe(50);
  });

  it('needs period + 1 closes', () => {
    expect(rsi([1, 2, 3], 3)).toBeUndefined();
  });
});

describe('macd', () => {
  it('is zero on a flat series', () => {
    expect(macd(Array<number>(30).fill(100))).toEqual({ macd: 0, signal: 0 });
  });

  it('leads its signal line in an uptrend', () => {
    const closes = Array.from({ length: 40 }, (_, i) => 100 + i);
    const result = macd(closes);
    expect(result?.macd).toBeGreaterThan(result?.signal ?? Infinity);
  });

  it('needs the slow span of closes', () => {
    expect(macd(Array<number>(25).fill(1))).toBeUndefined();
  });
});

describe('bollinger', () => {
  it('spans two sample deviations around the mean', () => {
    expect(bollinger([1, 2, 3], 3)).toEqual({ lower: 0, middle: 2, upper: 4 });
  });

  it('is undefined while warming up', () => {
    expect(bollinger([1, 2, 3])).toBeUndefined();
  });
});

describe('atr', () => {
  it('averages the true range including gaps from the previous close', () => {
    const candles = [candle(10, 0), candle(13, 1), candle(13, 2)];
    expect(atr(candles, 1)).toBe(2);
    expect(atr(candles, 2)).toBe(3);
  });

  it('needs period + 1 candles', () => {
    expect(atr([candle(10, 0), candle(11, 1)], 2)).toBeUndefined();
  });
});

describe('volatility', () => {
  it('is the sample deviation of returns', () => {
    expect(volatility([100, 110, 99])).toBeCloseTo(Math.sqrt(0.02), 10);
  });

  it('needs two returns', () => {
    expect(volatility([100, 110])).toBeUndefined();
  });
});
