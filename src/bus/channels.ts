import { z } from 'zod';
import {
  CandleSchema,
  ExecutionResultSchema,
  MarketStateSchema,
  RebalanceSuggestionSchema,
  RiskMetricsSchema,
  TradeDecisionSchema,
  TradeSignalSchema,
} from '../types';

const OrderBookLevelSchema = z.tuple([z.number(), z.number()]);

export const MarketDataMessageSchema = z.object({
  symbol: z.string(),
  state: MarketStateSchema,
  candles: z.array(CandleSchema),
  orderBook: z
    .object({
      bids: z.array(OrderBookLevelSchema),
      asks: z.array(OrderBookLevelSchema),
    })
    .optional(),
  recentTradeCount: z.number().int().nonnegative().default(0),
});

export const TradingSignalMessageSchema = z.object({
  signal: TradeSignalSchema,
  market: MarketStateSchema,
});

export const PortfolioUpdateSchema = z.object({
  equity: z.number(),
  availableBalance: z.number(),
  dailyPnl: z.number(),
  totalPnl: z.number(),
  positions: z.array(
    z.object({
      symbol: z.string(),
      quantity: z.number(),
      entryPrice: z.number(),
      currentPrice: z.number(),
      unrealizedPnl: z.number(),
    }),
  ),
  metrics: RiskMetricsSchema,
});

const schemas = {
  market_data: MarketDataMessageSchema,
  trading_signals: TradingSignalMessageSchema,
  trade_decisions: TradeDecisionSchema,
  execution_results: ExecutionResultSchema,
  portfolio_updates: PortfolioUpdateSchema,
  rebalance_suggestions: RebalanceSuggestionSchema,
};

export type ChannelPayloads = { [K in keyof typeof schemas]: z.output<(typeof schemas)[K]> };
export type Channel = keyof ChannelPayloads;

export const CHANNEL_SCHEMAS: { [C in Channel]: z.ZodType<ChannelPayloads[C], z.ZodTypeDef, unknown> } =
  schemas;

export const CHANNELS = [
  'market_data',
  'trading_signals',
  'trade_decisions',
  'execution_results',
  'portfolio_updates',
  'rebalance_suggestions',
] as const satisfies readonly Channel[];

export type MarketDataMessage = ChannelPayloads['market_data'];
export type TradingSignalMessage = ChannelPayloads['trading_signals'];
export type PortfolioUpdate = ChannelPayloads['portfolio_updates'];

export interface Envelope<C extends Channel = Channel> {
  id: string;
  channel: C;
  /** Publish time stamped by the bus, epoch milliseconds. */
  timestamp: number;
  payload: ChannelPayloads[C];
}

export type Handler<C extends Channel> = (
  payload: ChannelPayloads[C],
  envelope: Envelope<C>,
) => void | Promise<void>;
