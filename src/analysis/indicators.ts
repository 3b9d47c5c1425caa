import type { Candle } from '../types';
import { stdDev } from '../portfolio/metrics';

/** Mean of the last `period` values, or undefined while warming up. */
export function sma(values: readonly number[], period: number): number | undefined {
  if (period <= 0 || values.length < period) return undefined;
  let sum = 0;
  for (let i = values.length - period; i < values.length; i++) {
    sum += values[i] ?? 0;
  }
  return sum / period;
}

/** Exponential moving average series seeded with the first value. */
export function emaSeries(values: readonly number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  let previous: number | undefined;
  for (const value of values) {
    previous = previous === undefined ? value : alpha * value + (1 - alpha) * previous;
    out.push(previous);
  }
  return out;
}

/**
 * Simple-average RSI over the last `period` price changes. A window with
 * only gains is 100; a flat window is 50.
 */
export function rsi(closes: readonly number[], period = 14): number | undefined {
  if (closes.length < period + 1) return undefined;
  let gains = 0;
  let losses = 0;
  for (let i = closes.length - period; i < closes.length; i++) {
    const delta = (closes[i] ?? 0) - (closes[i - 1] ?? 0);
    if (delta > 0) gains += delta;
    else losses -= delta;
  }
  if (losses === 0) return gains === 0 ? 50 : 100;
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
}

export interface Macd {
  macd: number;
  signal: number;
}

export function macd(closes: readonly number[], fast = 12, slow = 26, signalSpan = 9): Macd | undefined {
  if (closes.length < slow) return undefined;
  const fastEma = emaSeries(closes, fast);
  const slowEma = emaSeries(closes, slow);
  const line = fastEma.map((value, i) => value - (slowEma[i] ?? value));
  const signal = emaSeries(line, signalSpan);
  const last = line.length - 1;
  return { macd: line[last] ?? 0, signal: signal[last] ?? 0 };
}

export interface BollingerBands {
  lower: number;
  middle: number;
  upper: number;
}

export function bollinger(closes: readonly number[], window = 20, width = 2): BollingerBands | undefined {
  const middle = sma(closes, window);
  if (middle === undefined) return undefined;
  const deviation = stdDev(closes.slice(-window));
  return { lower: middle - width * deviation, middle, upper: middle + width * deviation };
}

/** Average true range over the last `period` candles. */
export function atr(candles: readonly Candle[], period = 14): number | undefined {
  if (candles.length < period + 1) return undefined;
  let sum = 0;
  for (let i = candles.length - period; i < candles.length; i++) {
    const current = candles[i];
    const previous = candles[i - 1];
    if (!current || !previous) return undefined;
    sum += Math.max(
      current.high - current.low,
      Math.abs(current.high - previous.close),
      Math.abs(current.low - previous.close),
    );
  }
  return sum / period;
}

/** Sample standard deviation of close-to-close returns. */
export function volatility(closes: readonly number[]): number | undefined {
  if (closes.length < 3) return undefined;
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const previous = closes[i - 1] ?? 0;
    if (previous > 0) {
      returns.push((closes[i] ?? 0) / previous - 1);
    }
  }
  return returns.length >= 2 ? stdDev(returns) : undefined;
}
