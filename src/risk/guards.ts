import { sideSign } from '../types';
import type { PendingDecision, PortfolioState, TradeDecision } from '../types';

export interface GuardResult {
  guard: string;
  passed: boolean;
  reason?: string;
  details?: Record<string, unknown>;
}

export interface Guard {
  name: string;
  check(decision: TradeDecision, state: PortfolioState): GuardResult;
}

export interface GuardEvaluation {
  decision: TradeDecision;
  results: GuardResult[];
  passed: boolean;
}

/**
 * Overlays decisions that are published but not yet filled: each counts as
 * an open position on its symbol and adds its notional to the exposure and
 * the committed balance.
 */
export function withPendingDecisions(state: PortfolioState, pending: PendingDecision[]): PortfolioState {
  if (pending.length === 0) return state;

  const positions = { ...state.positions };
  let exposure = state.metrics.exposure;
  let availableBalance = state.availableBalance;
  for (const reservation of pending) {
    exposure += reservation.notional;
    availableBalance -= sideSign(reservation.side) * reservation.notional;
    if (!(reservation.symbol in positions)) {
      positions[reservation.symbol] = {
        symbol: reservation.symbol,
        quantity: sideSign(reservation.side) * reservation.quantity,
        entryPrice: reservation.price,
        currentPrice: reservation.price,
        unrealizedPnl: 0,
        entryTime: reservation.reservedAt,
      };
    }
  }

  return {
    ...state,
    availableBalance,
    positions,
    metrics: { ...state.metrics, exposure, positionCount: Object.keys(positions).length },
  };
}

export function runGuards(decision: TradeDecision, state: PortfolioState, guards: Guard[]): GuardEvaluation {
  const results = guards.map((guard) => guard.check(decision, state));
  return { decision, results, passed: results.every((result) => result.passed) };
}

/** Joined reasons of the guards that failed. */
export function failureReasons(evaluation: GuardEvaluation): string {
  return evaluation.results
    .filter((result) => !result.passed)
    .map((result) => `${result.guard}: ${result.reason ?? 'rejected'}`)
    .join('; ');
}

export class MaxPositionsGuard implements Guard {
  readonly name = 'MaxPositionsGuard';

  constructor(private readonly maxPositions: number) {}

  check(decision: TradeDecision, state: PortfolioState): GuardResult {
    const open = Object.keys(state.positions).length;
    // Adding to or reducing an open symbol never raises the count.
    const isNew = !(decision.symbol in state.positions);
    const passed = !isNew || open < this.maxPositions;
    return {
      guard: this.name,
      passed,
      reason: passed ? undefined : `${open} open positions, limit ${this.maxPositions}`,
      details: { open, maxPositions: this.maxPositions },
    };
  }
}

export class MaxExposureGuard implements Guard {
  readonly name = 'MaxExposureGuard';

  constructor(private readonly maxTotalExposure: number) {}

  check(decision: TradeDecision, state: PortfolioState): GuardResult {
    const limit = this.maxTotalExposure * state.equity;
    const projected = state.metrics.exposure + decision.notional;
    const passed = projected <= limit;
    return {
      guard: this.name,
      passed,
      reason: passed ? undefined : `exposure ${projected.toFixed(2)} would exceed ${limit.toFixed(2)}`,
      details: { projected, limit },
    };
  }
}

export class RiskPerTradeGuard implements Guard {
  readonly name = 'RiskPerTradeGuard';

  constructor(private readonly riskTolerance: number) {}

  check(decision: TradeDecision, state: PortfolioState): GuardResult {
    const atRisk = Math.abs(decision.entryPrice - decision.stopLoss) * decision.positionSize;
    const limit = this.riskTolerance * state.equity;
    const passed = atRisk <= limit;
    return {
      guard: this.name,
      passed,
      reason: passed ? undefined : `risk ${atRisk.toFixed(2)} exceeds ${limit.toFixed(2)}`,
      details: { atRisk, limit },
    };
  }
}

export class DrawdownGuard implements Guard {
  readonly name = 'DrawdownGuard';

  constructor(private readonly maxDrawdown: number) {}

  check(_decision: TradeDecision, state: PortfolioState): GuardResult {
    const drawdown = state.metrics.drawdown;
    const passed = drawdown < this.maxDrawdown;
    return {
      guard: this.name,
      passed,
      reason: passed ? undefined : `drawdown ${(drawdown * 100).toFixed(1)}% at or above ${(this.maxDrawdown * 100).toFixed(1)}%`,
      details: { drawdown, maxDrawdown: this.maxDrawdown },
    };
  }
}

export interface GuardLimits {
  maxPositions: number;
  maxTotalExposure: number;
  riskTolerance: number;
  maxDrawdown: number;
}

export function defaultGuards(limits: GuardLimits): Guard[] {
  return [
    new MaxPositionsGuard(limits.maxPositions),
    new MaxExposureGuard(limits.maxTotalExposure),
    new RiskPerTradeGuard(limits.riskTolerance),
    new DrawdownGuard(limits.maxDrawdown),
  ];
}
