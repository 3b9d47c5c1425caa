import { randomUUID } from 'crypto';
import { LedgerError } from '../errors';
import {
  DailySnapshot,
  Fill,
  PendingDecision,
  PortfolioState,
  Position,
  RebalanceSuggestion,
  RiskMetrics,
  TradeDecision,
  TradeRecord,
  normalizeSide,
  sideSign,
} from '../types';
import { Mutex } from '../utils/mutex';
import { herfindahl, sharpeRatio, valueAtRisk } from './metrics';

export const POSITION_EPSILON = 1e-8;
export const MAX_DAILY_SNAPSHOTS = 90;
const MAX_RECORDED_VIOLATIONS = 100;

export interface LedgerOptions {
  initialCapital: number;
  /** Maximum |notional| / equity before a rebalance is suggested. */
  maxPositionWeight: number;
  varConfidence?: number;
  tradeHistorySize?: number;
}

export interface FillOutcome {
  trade: TradeRecord;
  realizedPnl: number;
  /** Position after the fill, or null when it was closed. */
  position: Position | null;
  violations: string[];
}

const EMPTY_METRICS: RiskMetrics = {
  equity: 0,
  unrealizedPnl: 0,
  exposure: 0,
  concentration: 0,
  drawdown: 0,
  sharpeRatio: 0,
  valueAtRisk: 0,
  winRate: 0,
  tradeCount: 0,
  positionCount: 0,
};

/**
 * Single source of truth for balance, positions and risk metrics.
 *
 * Every mutation and every metrics pass runs inside one mutex, so a price
 * update and a fill on the same symbol can interleave but never partially
 * apply. Reads hand out copies; positions are never aliased.
 */
export class PortfolioLedger {
  private readonly lock = new Mutex();
  private readonly positions = new Map<string, Position>();
  private readonly trades: TradeRecord[] = [];
  private readonly snapshots: DailySnapshot[] = [];
  private readonly violations: string[] = [];
  private readonly reservations = new Map<string, PendingDecision>();
  private availableBalance: number;
  private equity: number;
  private peakEquity: number;
  private dailyPnl = 0;
  private totalPnl = 0;
  private metrics: RiskMetrics;
  private readonly varConfidence: number;
  private readonly tradeHistorySize: number;

  constructor(private readonly options: LedgerOptions) {
    if (!(options.initialCapital > 0)) {
      throw new LedgerError('initial capital must be positive');
    }
    this.availableBalance = options.initialCapital;
    this.equity = options.initialCapital;
    this.peakEquity = options.initialCapital;
    this.varConfidence = options.varConfidence ?? 0.95;
    this.tradeHistorySize = options.tradeHistorySize ?? 1000;
    this.metrics = { ...EMPTY_METRICS, equity: options.initialCapital };
  }

  applyFill(fill: Fill): Promise<FillOutcome> {
    return this.lock.runExclusive(() => this.applyFillLocked(fill));
  }

  updatePrice(symbol: string, price: number): Promise<void> {
    return this.lock.runExclusive(() => {
      const position = this.positions.get(symbol);
      if (!position || !(price > 0)) return;
      position.currentPrice = price;
      position.unrealizedPnl = (price - position.entryPrice) * position.quantity;
      this.recompute();
    });
  }

  computeMetrics(): Promise<RiskMetrics> {
    return this.lock.runExclusive(() => {
      this.recompute();
      return { ...this.metrics };
    });
  }

  /** Appends an immutable daily record and starts a new daily P&L period. */
  snapshot(date: Date = new Date()): Promise<DailySnapshot> {
    return this.lock.runExclusive(() => {
      this.recompute();
      const record: DailySnapshot = Object.freeze({
        date: date.toISOString().slice(0, 10),
        equity: this.equity,
        availableBalance: this.availableBalance,
        dailyPnl: this.dailyPnl,
        totalPnl: this.totalPnl,
        positionCount: this.positions.size,
        timestamp: date.getTime(),
      });
      this.snapshots.push(record);
      if (this.snapshots.length > MAX_DAILY_SNAPSHOTS) {
        this.snapshots.splice(0, this.snapshots.length - MAX_DAILY_SNAPSHOTS);
      }
      this.dailyPnl = 0;
      this.recompute();
      return record;
    });
  }

  /**
   * Suggests the reducing order that brings `symbol` exactly to the
   * configured maximum weight, or null when it is within bounds.
   */
  checkRebalance(symbol: string): Promise<RebalanceSuggestion | null> {
    return this.lock.runExclusive(() => {
      const position = this.positions.get(symbol);
      if (!position || this.equity <= 0 || position.currentPrice <= 0) return null;

      const notional = Math.abs(position.quantity * position.currentPrice);
      const weight = notional / this.equity;
      const target = this.options.maxPositionWeight;
      if (weight <= target) return null;

      const excessNotional = notional - target * this.equity;
      return {
        symbol,
        side: position.quantity > 0 ? 'SELL' : 'BUY',
        quantity: excessNotional / position.currentPrice,
        price: position.currentPrice,
        currentWeight: weight,
        targetWeight: target,
        timestamp: Date.now(),
      };
    });
  }

  /**
   * Holds a published decision until the fill carrying its id is applied,
   * it is released, or `ttlMs` passes.
   */
  reserve(decision: TradeDecision, ttlMs: number, now: number = Date.now()): void {
    this.reservations.set(decision.id, {
      decisionId: decision.id,
      symbol: decision.symbol,
      side: decision.direction,
      quantity: decision.positionSize,
      price: decision.entryPrice,
      notional: Math.abs(decision.notional),
      reservedAt: now,
      expiresAt: now + ttlMs,
    });
  }

  release(decisionId: string): boolean {
    return this.reservations.delete(decisionId);
  }

  getPendingDecisions(now: number = Date.now()): PendingDecision[] {
    for (const [id, reservation] of this.reservations) {
      if (reservation.expiresAt <= now) this.reservations.delete(id);
    }
    return [...this.reservations.values()].map((reservation) => ({ ...reservation }));
  }

  getState(): PortfolioState {
    const positions: Record<string, Position> = {};
    for (const [symbol, position] of this.positions) {
      positions[symbol] = { ...position };
    }
    return {
      equity: this.equity,
      availableBalance: this.availableBalance,
      peakEquity: this.peakEquity,
      positions,
      dailyPnl: this.dailyPnl,
      totalPnl: this.totalPnl,
      metrics: { ...this.metrics },
    };
  }

  getPosition(symbol: string): Position | undefined {
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  getTradeHistory(): readonly TradeRecord[] {
    return [...this.trades];
  }

  getSnapshots(): readonly DailySnapshot[] {
    return [...this.snapshots];
  }

  getViolations(): readonly string[] {
    return [...this.violations];
  }

  winRate(): number {
    return this.metrics.winRate;
  }

  closedTradeCount(): number {
    return this.trades.filter((trade) => trade.closing).length;
  }

  private applyFillLocked(fill: Fill): FillOutcome {
    const side = normalizeSide(fill.side);
    if (!(fill.price > 0) || !(fill.quantity > 0)) {
      throw new LedgerError(`invalid fill for ${fill.symbol}: price=${fill.price} quantity=${fill.quantity}`);
    }
    if (fill.decisionId !== undefined) {
      this.reservations.delete(fill.decisionId);
    }

    const signed = sideSign(side) * fill.quantity;
    const value = fill.price * fill.quantity;
    const existing = this.positions.get(fill.symbol);

    let realizedPnl = 0;
    let closedQuantity = 0;
    let closedCost = 0;

    if (!existing) {
      this.positions.set(fill.symbol, {
        symbol: fill.symbol,
        quantity: signed,
        entryPrice: fill.price,
        currentPrice: fill.price,
        unrealizedPnl: 0,
        entryTime: fill.timestamp,
      });
    } else if (Math.sign(existing.quantity) === Math.sign(signed)) {
      const oldQty = Math.abs(existing.quantity);
      existing.entryPrice = (existing.entryPrice * oldQty + fill.price * fill.quantity) / (oldQty + fill.quantity);
      existing.quantity += signed;
    } else {
      const direction = Math.sign(existing.quantity);
      closedQuantity = Math.min(fill.quantity, Math.abs(existing.quantity));
      closedCost = existing.entryPrice * closedQuantity;
      realizedPnl = (fill.price - existing.entryPrice) * closedQuantity * direction;

      const residual = existing.quantity + signed;
      if (Math.abs(residual) < POSITION_EPSILON) {
        this.positions.delete(fill.symbol);
      } else if (Math.sign(residual) === direction) {
        existing.quantity = residual;
      } else {
        // Crossed through flat: the excess opens a fresh position at the fill price.
        existing.quantity = residual;
        existing.entryPrice = fill.price;
        existing.entryTime = fill.timestamp;
      }
    }

    const position = this.positions.get(fill.symbol);
    if (position) {
      position.currentPrice = fill.price;
      position.unrealizedPnl = (fill.price - position.entryPrice) * position.quantity;
    }

    this.availableBalance -= signed * fill.price;
    this.dailyPnl += realizedPnl;
    this.totalPnl += realizedPnl;

    const trade: TradeRecord = Object.freeze({
      id: randomUUID(),
      symbol: fill.symbol,
      side,
      price: fill.price,
      quantity: fill.quantity,
      value,
      realizedPnl,
      pnlPercent: closedCost > 0 ? realizedPnl / closedCost : 0,
      closing: closedQuantity > 0,
      timestamp: fill.timestamp,
    });
    this.trades.push(trade);
    if (this.trades.length > this.tradeHistorySize) {
      this.trades.splice(0, this.trades.length - this.tradeHistorySize);
    }

    this.recompute();
    const violations = this.checkInvariants();

    return {
      trade,
      realizedPnl,
      position: position ? { ...position } : null,
      violations,
    };
  }

  private recompute(): void {
    let marketValue = 0;
    let unrealizedPnl = 0;
    const exposures: number[] = [];

    for (const position of this.positions.values()) {
      marketValue += position.quantity * position.currentPrice;
      unrealizedPnl += position.unrealizedPnl;
      exposures.push(Math.abs(position.quantity * position.currentPrice));
    }

    this.equity = this.availableBalance + marketValue;
    this.peakEquity = Math.max(this.peakEquity, this.equity);

    const closing = this.trades.filter((trade) => trade.closing);
    const wins = closing.filter((trade) => trade.realizedPnl > 0).length;

    this.metrics = {
      equity: this.equity,
      unrealizedPnl,
      exposure: exposures.reduce((sum, exposure) => sum + exposure, 0),
      concentration: herfindahl(exposures),
      drawdown: this.peakEquity > 0 ? 1 - this.equity / this.peakEquity : 0,
      sharpeRatio: sharpeRatio(this.snapshots.map((snapshot) => snapshot.equity)),
      valueAtRisk: valueAtRisk(
        closing.map((trade) => trade.pnlPercent),
        this.varConfidence,
        this.equity,
      ),
      winRate: closing.length > 0 ? wins / closing.length : 0,
      tradeCount: this.trades.length,
      positionCount: this.positions.size,
    };
  }

  private checkInvariants(): string[] {
    const found: string[] = [];
    const floor = -0.01 * this.options.initialCapital;
    if (this.availableBalance < floor) {
      found.push(`available balance ${this.availableBalance.toFixed(2)} is below ${floor.toFixed(2)}`);
    }
    for (const position of this.positions.values()) {
      if (Math.abs(position.quantity) < POSITION_EPSILON) {
        found.push(`dust position ${position.symbol} left in ledger`);
      }
    }
    this.violations.push(...found);
    if (this.violations.length > MAX_RECORDED_VIOLATIONS) {
      this.violations.splice(0, this.violations.length - MAX_RECORDED_VIOLATIONS);
    }
    return found;
  }
}
