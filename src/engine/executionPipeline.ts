import type { MessageBus } from '../bus/messageBus';
import { errorMessage } from '../errors';
import type { ExchangeClient } from '../exchange/types';
import type { Logger } from '../logger';
import type { NotificationSink } from '../notifications';
import { normalizeSide, oppositeSide } from '../types';
import type { Bracket, BracketLeg, BracketState, Order, OrderRequest, TradeDecision } from '../types';
import { retry, sleep } from '../utils/async';

export interface ExecutionPipelineOptions {
  retryAttempts: number;
  retryDelayMs: number;
  monitorIntervalMs: number;
  closedBracketHistory?: number;
}

const isDead = (order: Order | undefined): boolean =>
  order !== undefined && (order.status === 'canceled' || order.status === 'expired');

/** Both legs filled: the one with the earlier fill time closed the position. */
const filledFirst = (a: Order, b: Order): boolean =>
  a.filledAt !== undefined && b.filledAt !== undefined && a.filledAt < b.filledAt;

/**
 * Turns trade decisions into brackets (market entry + stop-loss +
 * take-profit) and follows them until a terminal state. Every leg fill is
 * published on `execution_results`; nothing else mutates the ledger.
 */
export class ExecutionPipeline {
  private readonly brackets = new Map<string, Bracket>();
  private readonly closed: Bracket[] = [];
  private readonly historySize: number;

  constructor(
    private readonly exchange: ExchangeClient,
    private readonly bus: MessageBus,
    private readonly notifier: NotificationSink,
    private readonly logger: Logger,
    private readonly options: ExecutionPipelineOptions,
  ) {
    this.historySize = options.closedBracketHistory ?? 200;
  }

  /**
   * Places the entry and, once it is accepted, both exit legs as one OCO
   * group. `signal` only cuts short the entry's retries. Returns the entry
   * order, or null when it failed every attempt; in that case no leg is
   * placed and nothing is published.
   */
  async execute(decision: TradeDecision, signal?: AbortSignal): Promise<Order | null> {
    const side = normalizeSide(decision.direction);
    const quantity = decision.positionSize;

    const entry = await this.placeLeg(
      'entry',
      { symbol: decision.symbol, type: 'market', side, quantity, price: decision.entryPrice },
      signal,
    );
    if (!entry) {
      this.logger.error(`❌ Entry for ${side} ${quantity} ${decision.symbol} failed after ${this.options.retryAttempts} attempts`);
      await this.notifier.sendMessage(`❌ Order failed: ${side} ${decision.symbol} (${decision.strategy})`);
      return null;
    }

    // Once the entry exists the exits go out regardless of a stop request;
    // retryAttempts still bounds them.
    const exitSide = oppositeSide(side);
    const ocoGroup = entry.id;
    const stopLoss = await this.placeLeg('stop_loss', {
      symbol: decision.symbol,
      type: 'stop_loss',
      side: exitSide,
      quantity,
      price: decision.stopLoss,
      ocoGroup,
    });
    const takeProfit = await this.placeLeg('take_profit', {
      symbol: decision.symbol,
      type: 'take_profit',
      side: exitSide,
      quantity,
      price: decision.takeProfit,
      ocoGroup,
    });

    const bracket: Bracket = {
      entryId: entry.id,
      decision,
      entry,
      stopLoss: stopLoss ?? undefined,
      takeProfit: takeProfit ?? undefined,
      state: 'pending',
      openedAt: Date.now(),
    };
    this.brackets.set(entry.id, bracket);

    const missing = [stopLoss ? null : 'stop-loss', takeProfit ? null : 'take-profit'].filter(Boolean);
    if (missing.length > 0) {
      this.logger.warn(`Bracket ${entry.id} is missing its ${missing.join(' and ')} leg`);
      await this.notifier.sendMessage(`⚠️ ${decision.symbol} bracket ${entry.id} opened without ${missing.join(' and ')}`);
    }

    this.logger.info(
      `📝 Bracket ${entry.id}: ${side} ${quantity} ${decision.symbol} SL ${decision.stopLoss} TP ${decision.takeProfit}`,
    );

    if (entry.status === 'filled') {
      bracket.state = 'filled';
      this.publishFill(bracket, 'entry', entry);
    }
    return entry;
  }

  /** One polling pass over every open bracket. */
  async monitor(): Promise<void> {
    for (const bracket of [...this.brackets.values()]) {
      try {
        await this.monitorBracket(bracket);
      } catch (error) {
        this.logger.warn(`Skipping bracket ${bracket.entryId} this pass: ${errorMessage(error)}`);
      }
    }
  }

  async startMonitoring(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.monitor();
      await sleep(this.options.monitorIntervalMs, signal);
    }
  }

  /** Cancels every live leg; false when the bracket is not open. */
  async cancelBracket(entryId: string): Promise<boolean> {
    const bracket = this.brackets.get(entryId);
    if (!bracket) return false;

    const legs = bracket.state === 'pending' ? [bracket.entry, bracket.stopLoss, bracket.takeProfit] : [bracket.stopLoss, bracket.takeProfit];
    await this.cancelLegs(bracket, legs);
    this.close(bracket, 'manually_canceled');
    await this.notifier.sendMessage(`🛑 Bracket ${entryId} on ${bracket.decision.symbol} canceled`);
    return true;
  }

  getBrackets(): Bracket[] {
    return [...this.brackets.values()].map((bracket) => ({ ...bracket }));
  }

  getClosedBrackets(): Bracket[] {
    return [...this.closed];
  }

  private async monitorBracket(bracket: Bracket): Promise<void> {
    const symbol = bracket.decision.symbol;

    if (bracket.state === 'pending') {
      const entry = await this.exchange.fetchOrderStatus(bracket.entry.id, symbol);
      if (!this.brackets.has(bracket.entryId)) return;
      bracket.entry = entry;

      if (entry.status === 'filled') {
        bracket.state = 'filled';
        this.publishFill(bracket, 'entry', entry);
      } else if (isDead(entry)) {
        await this.cancelLegs(bracket, [bracket.stopLoss, bracket.takeProfit]);
        this.close(bracket, entry.status === 'expired' ? 'expired' : 'canceled');
        await this.notifier.sendMessage(`⌛ Entry ${entry.id} on ${symbol} ${entry.status}, bracket dropped`);
      }
      return;
    }

    const stopLoss = bracket.stopLoss ? await this.exchange.fetchOrderStatus(bracket.stopLoss.id, symbol) : undefined;
    const takeProfit = bracket.takeProfit ? await this.exchange.fetchOrderStatus(bracket.takeProfit.id, symbol) : undefined;
    if (!this.brackets.has(bracket.entryId)) return;
    bracket.stopLoss = stopLoss;
    bracket.takeProfit = takeProfit;

    if (stopLoss?.status === 'filled' && !(takeProfit?.status === 'filled' && filledFirst(takeProfit, stopLoss))) {
      await this.cancelLegs(bracket, [takeProfit]);
      this.publishFill(bracket, 'stop_loss', stopLoss);
      this.close(bracket, 'closed_stop');
      await this.notifier.sendMessage(`🔻 Stop-loss hit on ${symbol} @ ${stopLoss.fillPrice ?? stopLoss.price}`);
    } else if (takeProfit?.status === 'filled') {
      await this.cancelLegs(bracket, [stopLoss]);
      this.publishFill(bracket, 'take_profit', takeProfit);
      this.close(bracket, 'closed_take_profit');
      await this.notifier.sendMessage(`🎯 Take-profit hit on ${symbol} @ ${takeProfit.fillPrice ?? takeProfit.price}`);
    } else if (isDead(stopLoss) || isDead(takeProfit)) {
      await this.cancelLegs(bracket, [stopLoss, takeProfit]);
      this.close(bracket, 'manually_canceled');
      await this.notifier.sendMessage(`🛑 Exit leg of ${bracket.entryId} on ${symbol} canceled externally`);
    }
  }

  private placeLeg(leg: BracketLeg, request: OrderRequest, signal?: AbortSignal): Promise<Order | null> {
    return retry(() => this.exchange.createOrder(request), {
      attempts: this.options.retryAttempts,
      delayMs: this.options.retryDelayMs,
      signal,
      onFailure: (error, attempt) => {
        this.logger.warn(
          `${leg} order for ${request.symbol} failed (attempt ${attempt}/${this.options.retryAttempts}): ${errorMessage(error)}`,
        );
      },
    });
  }

  private async cancelLegs(bracket: Bracket, legs: (Order | undefined)[]): Promise<void> {
    for (const leg of legs) {
      if (!leg || leg.status !== 'pending') continue;
      try {
        await this.exchange.cancelOrder(leg.id, bracket.decision.symbol);
        leg.status = 'canceled';
      } catch (error) {
        this.logger.warn(`Could not cancel ${leg.type} order ${leg.id}: ${errorMessage(error)}`);
      }
    }
  }

  private publishFill(bracket: Bracket, leg: BracketLeg, order: Order): void {
    const price = order.fillPrice ?? order.price;
    if (!(price > 0) || !(order.quantity > 0)) {
      this.logger.error(`Fill of ${order.id} has no usable price or quantity, not published`);
      return;
    }
    this.bus.publish('execution_results', {
      orderId: order.id,
      bracketId: bracket.entryId,
      decisionId: bracket.decision.id,
      leg,
      symbol: order.symbol,
      side: order.side,
      price,
      quantity: order.quantity,
      timestamp: Date.now(),
    });
    this.logger.info(`✅ ${leg} filled: ${order.side} ${order.quantity} ${order.symbol} @ ${price}`);
  }

  private close(bracket: Bracket, state: BracketState): void {
    if (!this.brackets.delete(bracket.entryId)) return;
    bracket.state = state;
    bracket.closedAt = Date.now();
    this.closed.push(bracket);
    if (this.closed.length > this.historySize) {
      this.closed.splice(0, this.closed.length - this.historySize);
    }
    this.logger.info(`Bracket ${bracket.entryId} closed: ${state}`);
  }
}
