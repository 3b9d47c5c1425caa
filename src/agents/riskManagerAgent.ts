import type { TradingSignalMessage } from '../bus/channels';
import type { MessageBus } from '../bus/messageBus';
import type { AppContext } from '../context';
import type { PortfolioLedger } from '../portfolio/ledger';
import { failureReasons, runGuards, withPendingDecisions } from '../risk/guards';
import type { Guard } from '../risk/guards';
import type { RiskSizer } from '../risk/riskSizer';
import type { TradeDecision } from '../types';
import { BusAgent } from './busAgent';

/**
 * Sizes signals against the ledger and forwards the ones every guard
 * accepts. Each forwarded decision is reserved in the ledger, so signals
 * arriving before its entry fills see it as an open position.
 */
export class RiskManagerAgent extends BusAgent {
  private readonly pendingTtlMs: number;

  constructor(
    ctx: AppContext,
    bus: MessageBus,
    private readonly ledger: PortfolioLedger,
    private readonly sizer: RiskSizer,
    private readonly guards: Guard[],
  ) {
    super('risk-manager', bus, ctx.logger);
    this.pendingTtlMs = ctx.config.riskManagement.pendingDecisionTtl * 1000;
  }

  protected attach(): void {
    this.listen('trading_signals', (message) => {
      this.assess(message);
    });
  }

  assess({ signal, market }: TradingSignalMessage): TradeDecision | null {
    const state = withPendingDecisions(this.ledger.getState(), this.ledger.getPendingDecisions());
    const evaluation = this.sizer.evaluate(signal, market, {
      availableBalance: state.availableBalance,
      winRate: this.ledger.winRate(),
      closedTrades: this.ledger.closedTradeCount(),
    });

    if (!evaluation.accepted) {
      this.logger.debug(`Signal on ${signal.symbol} rejected: ${evaluation.reason}`);
      return null;
    }

    const verdict = runGuards(evaluation.decision, state, this.guards);
    if (!verdict.passed) {
      this.logger.info(`🚫 Decision on ${signal.symbol} dropped: ${failureReasons(verdict)}`);
      return null;
    }

    const decision = evaluation.decision;
    this.logger.info(
      `⚖️ ${decision.direction} ${decision.positionSize.toFixed(6)} ${decision.symbol} (notional ${decision.notional.toFixed(2)})`,
    );
    this.ledger.reserve(decision, this.pendingTtlMs);
    this.bus.publish('trade_decisions', decision);
    return decision;
  }
}
