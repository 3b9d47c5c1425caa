import { randomUUID } from 'crypto';
import { normalizeSide } from '../types';
import type { MarketState, Side, TradeDecision, TradeSignal } from '../types';

/** Cap on any single position as a share of available balance. */
export const MAX_BALANCE_SHARE = 0.1;

export interface RiskSizerOptions {
  minConfidence: number;
  maxPositionSize: number;
  defaultWinRate: number;
  minTradesForStats: number;
  stopAtrMultiplier: number;
  takeProfitAtrMultiplier: number;
}

/** What the sizer needs to know about the account; read from a ledger state. */
export interface AccountView {
  availableBalance: number;
  winRate: number;
  closedTrades: number;
}

export interface ExitLevels {
  stopLoss: number;
  takeProfit: number;
}

export type Evaluation =
  | { accepted: true; decision: TradeDecision }
  | { accepted: false; reason: string };

export function kelly(winRate: number, rewardRisk: number): number {
  return winRate - (1 - winRate) / rewardRisk;
}

/** Half-Kelly, floored at zero. */
export function kellyFraction(winRate: number, rewardRisk: number): number {
  if (!(rewardRisk > 0)) return 0;
  return Math.max(0, 0.5 * kelly(winRate, rewardRisk));
}

export function positionNotional(fraction: number, availableBalance: number, maxPositionSize: number): number {
  if (!(availableBalance > 0)) return 0;
  return Math.max(0, Math.min(fraction * availableBalance, maxPositionSize, MAX_BALANCE_SHARE * availableBalance));
}

/**
 * Stateless: every input comes with the call. Sizing uses the ledger's win
 * rate once enough closing trades exist, the configured prior before that.
 */
export class RiskSizer {
  constructor(private readonly options: RiskSizerOptions) {}

  get rewardRiskRatio(): number {
    return this.options.takeProfitAtrMultiplier / this.options.stopAtrMultiplier;
  }

  computeExitLevels(entryPrice: number, direction: Side, atr: number | undefined): ExitLevels | null {
    if (atr === undefined || !Number.isFinite(atr) || atr <= 0) return null;
    const sign = direction === 'BUY' ? 1 : -1;
    return {
      stopLoss: entryPrice - sign * this.options.stopAtrMultiplier * atr,
      takeProfit: entryPrice + sign * this.options.takeProfitAtrMultiplier * atr,
    };
  }

  winRateFor(account: AccountView): number {
    return account.closedTrades >= this.options.minTradesForStats ? account.winRate : this.options.defaultWinRate;
  }

  evaluate(signal: TradeSignal, market: MarketState, account: AccountView): Evaluation {
    if (signal.confidence < this.options.minConfidence) {
      return { accepted: false, reason: `confidence ${signal.confidence.toFixed(2)} below ${this.options.minConfidence}` };
    }

    const price = signal.price > 0 ? signal.price : market.price;
    if (!(price > 0)) {
      return { accepted: false, reason: `no usable price for ${signal.symbol}` };
    }

    const direction = normalizeSide(signal.direction);
    const levels = this.computeExitLevels(price, direction, market.atr);
    if (!levels) {
      return { accepted: false, reason: `ATR unavailable for ${signal.symbol}` };
    }

    const fraction = kellyFraction(this.winRateFor(account), this.rewardRiskRatio);
    const notional = positionNotional(fraction, account.availableBalance, this.options.maxPositionSize);
    if (notional <= 0) {
      return { accepted: false, reason: `sized notional ${notional.toFixed(2)} is not positive` };
    }

    return {
      accepted: true,
      decision: {
        id: randomUUID(),
        symbol: signal.symbol,
        direction,
        positionSize: notional / price,
        entryPrice: price,
        stopLoss: levels.stopLoss,
        takeProfit: levels.takeProfit,
        notional,
        strategy: signal.strategy,
        timestamp: Date.now(),
      },
    };
  }
}
