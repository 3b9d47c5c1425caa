import type { MessageBus } from '../bus/messageBus';
import type { AppContext } from '../context';
import type { ExecutionPipeline } from '../engine/executionPipeline';
import { isPriceFeedAware } from '../exchange/types';
import type { ExchangeClient } from '../exchange/types';
import type { PortfolioLedger } from '../portfolio/ledger';
import { BusAgent } from './busAgent';

/**
 * Executes decisions in arrival order (the bus delivers one `trade_decisions`
 * envelope at a time) and runs the bracket monitor while it is up. A
 * decision whose entry is never placed gives its ledger reservation back.
 */
export class ExecutionAgent extends BusAgent {
  constructor(
    ctx: AppContext,
    bus: MessageBus,
    private readonly pipeline: ExecutionPipeline,
    private readonly exchange: ExchangeClient,
    private readonly ledger: PortfolioLedger,
  ) {
    super('execution', bus, ctx.logger);
  }

  protected attach(): void {
    this.listen('trade_decisions', async (decision) => {
      const entry = this.stopSignal.aborted ? null : await this.pipeline.execute(decision, this.stopSignal);
      if (!entry) {
        this.ledger.release(decision.id);
      }
    });

    const exchange = this.exchange;
    if (isPriceFeedAware(exchange)) {
      this.listen('market_data', (message) => {
        exchange.updatePrice(message.symbol, message.state.price);
      });
    }
  }

  protected work(signal: AbortSignal): Promise<void> {
    return this.pipeline.startMonitoring(signal);
  }
}
