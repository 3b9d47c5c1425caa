import { z } from 'zod';

/**
 * Canonical trade side. Inbound strings are accepted in any casing
 * ('buy', 'Buy', 'BUY') and normalized here.
 */
export const SideSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(['BUY', 'SELL']));

export type Side = z.infer<typeof SideSchema>;

export function normalizeSide(value: string): Side {
  return SideSchema.parse(value);
}

export function oppositeSide(side: Side): Side {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

export function sideSign(side: Side): 1 | -1 {
  return side === 'BUY' ? 1 : -1;
}

export const CandleSchema = z.object({
  timestamp: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

export type Candle = z.infer<typeof CandleSchema>;

export const MarketStateSchema = z.object({
  symbol: z.string(),
  price: z.number(),
  atr: z.number().optional(),
  volatility: z.number().optional(),
  timestamp: z.number(),
});

export type MarketState = z.infer<typeof MarketStateSchema>;

export const TradeSignalSchema = z.object({
  symbol: z.string(),
  direction: SideSchema,
  confidence: z.number().min(0).max(1),
  price: z.number(),
  strategy: z.string(),
  metadata: z.record(z.unknown()).default({}),
  timestamp: z.number(),
});

export type TradeSignal = z.infer<typeof TradeSignalSchema>;

export const TradeDecisionSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  direction: SideSchema,
  positionSize: z.number().positive(),
  entryPrice: z.number().positive(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  notional: z.number(),
  strategy: z.string(),
  timestamp: z.number(),
});

export type TradeDecision = z.infer<typeof TradeDecisionSchema>;

export type OrderType = 'market' | 'stop_loss' | 'take_profit';
export type OrderStatus = 'pending' | 'filled' | 'canceled' | 'expired';

export interface Order {
  id: string;
  symbol: string;
  type: OrderType;
  side: Side;
  quantity: number;
  /** Trigger price for exit legs, requested price for the entry. */
  price: number;
  fillPrice?: number;
  status: OrderStatus;
  timestamp: number;
  filledAt?: number;
  ocoGroup?: string;
}

export interface OrderRequest {
  symbol: string;
  type: OrderType;
  side: Side;
  quantity: number;
  price?: number;
  /** Resting orders sharing a group are one-cancels-other. */
  ocoGroup?: string;
}

export type BracketState =
  | 'pending'
  | 'filled'
  | 'closed_stop'
  | 'closed_take_profit'
  | 'canceled'
  | 'expired'
  | 'manually_canceled';

export type BracketLeg = 'entry' | 'stop_loss' | 'take_profit';

export interface Bracket {
  entryId: string;
  decision: TradeDecision;
  entry: Order;
  stopLoss?: Order;
  takeProfit?: Order;
  state: BracketState;
  openedAt: number;
  closedAt?: number;
}

export const ExecutionResultSchema = z.object({
  orderId: z.string(),
  bracketId: z.string(),
  decisionId: z.string().optional(),
  leg: z.enum(['entry', 'stop_loss', 'take_profit']),
  symbol: z.string(),
  side: SideSchema,
  price: z.number().positive(),
  quantity: z.number().positive(),
  timestamp: z.number(),
});

export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

export interface Position {
  symbol: string;
  /** Signed: positive long, negative short. */
  quantity: number;
  entryPrice: number;
  currentPrice: number;
  unrealizedPnl: number;
  entryTime: number;
}

export interface Fill {
  symbol: string;
  /** Any casing; normalized on entry to the ledger. */
  side: string;
  price: number;
  quantity: number;
  timestamp: number;
  /** Settles the pending reservation of the decision that produced it. */
  decisionId?: string;
}

/** A published decision whose entry has not reached the ledger yet. */
export interface PendingDecision {
  decisionId: string;
  symbol: string;
  side: Side;
  quantity: number;
  price: number;
  notional: number;
  reservedAt: number;
  expiresAt: number;
}

export interface TradeRecord {
  readonly id: string;
  readonly symbol: string;
  readonly side: Side;
  readonly price: number;
  readonly quantity: number;
  readonly value: number;
  readonly realizedPnl: number;
  /** Realized P&L over the cost basis closed; 0 for opening fills. */
  readonly pnlPercent: number;
  readonly closing: boolean;
  readonly timestamp: number;
}

export interface DailySnapshot {
  readonly date: string;
  readonly equity: number;
  readonly availableBalance: number;
  readonly dailyPnl: number;
  readonly totalPnl: number;
  readonly positionCount: number;
  readonly timestamp: number;
}

export const RiskMetricsSchema = z.object({
  equity: z.number(),
  unrealizedPnl: z.number(),
  exposure: z.number(),
  concentration: z.number(),
  drawdown: z.number(),
  sharpeRatio: z.number(),
  valueAtRisk: z.number(),
  winRate: z.number(),
  tradeCount: z.number(),
  positionCount: z.number(),
});

export type RiskMetrics = z.infer<typeof RiskMetricsSchema>;

export interface PortfolioState {
  equity: number;
  availableBalance: number;
  peakEquity: number;
  positions: Record<string, Position>;
  dailyPnl: number;
  totalPnl: number;
  metrics: RiskMetrics;
}

export const RebalanceSuggestionSchema = z.object({
  symbol: z.string(),
  side: SideSchema,
  quantity: z.number().positive(),
  price: z.number(),
  currentWeight: z.number(),
  targetWeight: z.number(),
  timestamp: z.number(),
});

export type RebalanceSuggestion = z.infer<typeof RebalanceSuggestionSchema>;
