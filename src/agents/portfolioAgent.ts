import type { PortfolioUpdate } from '../bus/channels';
import type { MessageBus } from '../bus/messageBus';
import type { AppContext } from '../context';
import { errorMessage } from '../errors';
import type { NotificationSink } from '../notifications';
import type { FillOutcome, PortfolioLedger } from '../portfolio/ledger';
import type { ExecutionResult } from '../types';
import { sleep } from '../utils/async';
import { BusAgent } from './busAgent';

const utcDay = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * The only writer of the ledger: fills from `execution_results`, marks from
 * `market_data`. Publishes `portfolio_updates` periodically and rebalance
 * suggestions after fills; closes the daily snapshot on UTC day change.
 */
export class PortfolioAgent extends BusAgent {
  private currentDay: string;
  private readonly intervalMs: number;

  constructor(
    ctx: AppContext,
    bus: MessageBus,
    private readonly ledger: PortfolioLedger,
    private readonly notifier: NotificationSink,
    now: Date = new Date(),
  ) {
    super('portfolio', bus, ctx.logger);
    this.intervalMs = ctx.config.portfolio.updateInterval * 1000;
    this.currentDay = utcDay(now);
  }

  protected attach(): void {
    this.listen('execution_results', (result) => this.onFill(result));
    this.listen('market_data', (message) => this.ledger.updatePrice(message.symbol, message.state.price));
  }

  protected async work(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;
      await this.rollover(new Date());
      await this.publishUpdate();
    }
  }

  async onFill(result: ExecutionResult): Promise<void> {
    let outcome: FillOutcome;
    try {
      outcome = await this.ledger.applyFill(result);
    } catch (error) {
      this.logger.error(`Fill ${result.orderId} rejected by ledger: ${errorMessage(error)}`);
      await this.notifier.sendMessage(`❌ Fill ${result.orderId} on ${result.symbol} rejected: ${errorMessage(error)}`);
      return;
    }

    if (outcome.realizedPnl !== 0) {
      this.logger.info(`💰 Realized ${outcome.realizedPnl.toFixed(2)} on ${result.symbol}`);
    }

    for (const violation of outcome.violations) {
      this.logger.error(`Ledger invariant violated: ${violation}`);
      await this.notifier.sendMessage(`🚨 Ledger invariant violated: ${violation}`);
    }

    const suggestion = await this.ledger.checkRebalance(result.symbol);
    if (suggestion) {
      this.logger.info(
        `⚖️ Rebalance ${suggestion.symbol}: ${suggestion.side} ${suggestion.quantity} (weight ${(suggestion.currentWeight * 100).toFixed(1)}%)`,
      );
      this.bus.publish('rebalance_suggestions', suggestion);
    }
  }

  /** Snapshots the day that ended; true when one was taken. */
  async rollover(now: Date): Promise<boolean> {
    const today = utcDay(now);
    if (today === this.currentDay) return false;
    const closing = this.currentDay;
    this.currentDay = today;
    const record = await this.ledger.snapshot(new Date(`${closing}T23:59:59.999Z`));
    this.logger.info(`📅 Snapshot ${record.date}: equity ${record.equity.toFixed(2)}, daily P&L ${record.dailyPnl.toFixed(2)}`);
    return true;
  }

  async publishUpdate(): Promise<PortfolioUpdate> {
    const metrics = await this.ledger.computeMetrics();
    const state = this.ledger.getState();
    const update: PortfolioUpdate = {
      equity: state.equity,
      availableBalance: state.availableBalance,
      dailyPnl: state.dailyPnl,
      totalPnl: state.totalPnl,
      positions: Object.values(state.positions).map((position) => ({
        symbol: position.symbol,
        quantity: position.quantity,
        entryPrice: position.entryPrice,
        currentPrice: position.currentPrice,
        unrealizedPnl: position.unrealizedPnl,
      })),
      metrics,
    };
    this.bus.publish('portfolio_updates', update);
    return update;
  }
}
