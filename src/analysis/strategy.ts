import type { Candle, TradeSignal } from '../types';
import { bollinger, macd, rsi, sma } from './indicators';

export interface SignalStrategy {
  readonly name: string;
  evaluate(symbol: string, candles: readonly Candle[]): TradeSignal[];
}

export interface TechnicalStrategyOptions {
  rsiPeriod: number;
  rsiOversold: number;
  rsiOverbought: number;
  /** Last volume over its 20-candle mean required for a trend entry. */
  volumeThreshold?: number;
}

const MIN_CANDLES = 26;
const EXIT_CONFIDENCE = 0.8;
const MAX_TREND_CONFIDENCE = 0.95;

/**
 * Three mutually exclusive rules, checked in order:
 * - trend following: MACD above its signal, volume surge, price above the
 *   Bollinger middle band → BUY;
 * - mean reversion: RSI oversold and price under the lower band → BUY,
 *   confidence growing with the distance below the oversold level;
 * - exit: RSI overbought or price over the upper band → SELL.
 */
export class TechnicalStrategy implements SignalStrategy {
  readonly name = 'technical';

  constructor(private readonly options: TechnicalStrategyOptions) {}

  evaluate(symbol: string, candles: readonly Candle[]): TradeSignal[] {
    if (candles.length < MIN_CANDLES) return [];

    const closes = candles.map((candle) => candle.close);
    const volumes = candles.map((candle) => candle.volume);
    const price = closes[closes.length - 1];
    const momentum = macd(closes);
    const bands = bollinger(closes);
    const strength = rsi(closes, this.options.rsiPeriod);
    if (price === undefined || !momentum || !bands || strength === undefined) return [];

    const averageVolume = sma(volumes, 20);
    const lastVolume = volumes[volumes.length - 1] ?? 0;
    const volumeRatio = averageVolume ? lastVolume / averageVolume : 0;
    const timestamp = Date.now();
    const metadata = { rsi: strength, macd: momentum.macd, macdSignal: momentum.signal, volumeRatio };

    const signal = (strategy: string, direction: 'BUY' | 'SELL', confidence: number): TradeSignal => ({
      symbol,
      direction,
      confidence: Math.min(Math.max(confidence, 0), 1),
      price,
      strategy,
      metadata,
      timestamp,
    });

    if (momentum.macd > momentum.signal && volumeRatio > (this.options.volumeThreshold ?? 1.2)) {
      if (price > bands.middle) {
        const spread = momentum.signal === 0 ? 1 : (momentum.macd - momentum.signal) / Math.abs(momentum.signal);
        return [signal('trend_following', 'BUY', Math.min(spread * 2, MAX_TREND_CONFIDENCE))];
      }
      return [];
    }

    if (strength < this.options.rsiOversold && price < bands.lower) {
      return [signal('mean_reversion', 'BUY', (this.options.rsiOversold - strength) / this.options.rsiOversold)];
    }

    if (strength > this.options.rsiOverbought || price > bands.upper) {
      return [signal('take_profit', 'SELL', EXIT_CONFIDENCE)];
    }

    return [];
  }
}
