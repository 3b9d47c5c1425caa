import { Telegraf } from 'telegraf';
import type { Agent } from '../agents/types';
import type { AppContext } from '../context';
import type { ExecutionPipeline } from '../engine/executionPipeline';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { PortfolioLedger } from '../portfolio/ledger';
import type { Bracket, PortfolioState, RiskMetrics } from '../types';

export const HELP_TEXT = [
  '🤖 Trading Supervisor Commands',
  '',
  '/status - Equity and open positions',
  '/metrics - Risk metrics',
  '/brackets - Open brackets',
  '/ping - Health check',
  '/help - This help',
].join('\n');

const money = (value: number): string => value.toFixed(2);
const pct = (value: number): string => `${(value * 100).toFixed(2)}%`;

export function formatStatus(state: PortfolioState): string {
  const lines = [
    `💼 Equity: ${money(state.equity)}`,
    `💵 Available: ${money(state.availableBalance)}`,
    `📆 Daily P&L: ${money(state.dailyPnl)} | Total P&L: ${money(state.totalPnl)}`,
  ];
  const positions = Object.values(state.positions);
  if (positions.length === 0) {
    lines.push('📭 No open positions');
  } else {
    lines.push('📊 Positions:');
    for (const p of positions) {
      const side = p.quantity > 0 ? 'LONG' : 'SHORT';
      lines.push(`${p.symbol}: ${side} ${Math.abs(p.quantity)} @ ${p.entryPrice} (uPnL ${money(p.unrealizedPnl)})`);
    }
  }
  return lines.join('\n');
}

export function formatMetrics(metrics: RiskMetrics): string {
  return [
    '📐 Risk metrics',
    `Exposure: ${money(metrics.exposure)}`,
    `Concentration: ${metrics.concentration.toFixed(3)}`,
    `Drawdown: ${pct(metrics.drawdown)}`,
    `Sharpe: ${metrics.sharpeRatio.toFixed(2)}`,
    `VaR: ${money(metrics.valueAtRisk)}`,
    `Win rate: ${pct(metrics.winRate)} over ${metrics.tradeCount} trades`,
  ].join('\n');
}

export function formatBrackets(brackets: Bracket[]): string {
  if (brackets.length === 0) return '📭 No open brackets';
  return brackets
    .map(
      (b) =>
        `${b.entryId} ${b.decision.direction} ${b.decision.symbol} [${b.state}] SL ${b.decision.stopLoss} TP ${b.decision.takeProfit}`,
    )
    .join('\n');
}

/** True when `userId` may use the bot; an empty list allows everyone. */
export function isAllowed(allowedUsers: readonly string[], userId: number | undefined): boolean {
  if (allowedUsers.length === 0) return true;
  return userId !== undefined && allowedUsers.includes(String(userId));
}

export class TelegramController implements Agent {
  readonly name = 'telegram';
  private readonly bot: Telegraf;
  private readonly logger: Logger;
  private launched = false;

  constructor(
    ctx: AppContext,
    private readonly ledger: PortfolioLedger,
    private readonly pipeline: ExecutionPipeline,
  ) {
    if (!ctx.config.telegram) {
      throw new Error('Telegram controller needs telegram.botToken and telegram.chatId');
    }
    this.logger = ctx.logger.child(this.name);
    this.bot = new Telegraf(ctx.config.telegram.botToken);
    this.setupCommands(ctx.config.telegram.allowedUsers);
  }

  private setupCommands(allowedUsers: string[]): void {
    this.bot.use(async (ctx, next) => {
      if (!isAllowed(allowedUsers, ctx.from?.id)) {
        this.logger.warn(`Ignoring command from unauthorized user ${ctx.from?.id ?? 'unknown'}`);
        return;
      }
      await next();
    });

    this.bot.start((ctx) => ctx.reply(HELP_TEXT));
    this.bot.help((ctx) => ctx.reply(HELP_TEXT));
    this.bot.command('status', (ctx) => ctx.reply(formatStatus(this.ledger.getState())));
    this.bot.command('metrics', async (ctx) => {
      await ctx.reply(formatMetrics(await this.ledger.computeMetrics()));
    });
    this.bot.command('brackets', (ctx) => ctx.reply(formatBrackets(this.pipeline.getBrackets())));
    this.bot.command('ping', (ctx) => ctx.reply('✅ Alive'));

    this.bot.catch((error) => {
      this.logger.error(`Command failed: ${errorMessage(error)}`);
    });
  }

  /** Polls until stopped; rejects when the bot cannot start. */
  async run(signal: AbortSignal): Promise<void> {
    signal.addEventListener('abort', () => this.halt('abort'), { once: true });
    this.logger.info('📱 Starting Telegram bot...');
    this.launched = true;
    try {
      await this.bot.launch(() => this.logger.info('✅ Telegram bot started'));
    } finally {
      this.launched = false;
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.launched;
  }

  async stop(): Promise<void> {
    this.halt('stop');
  }

  private halt(reason: string): void {
    if (!this.launched) return;
    try {
      this.bot.stop(reason);
    } catch (error) {
      this.logger.warn(`Telegram bot stop: ${errorMessage(error)}`);
    }
  }
}
