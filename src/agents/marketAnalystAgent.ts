import type { SignalStrategy } from '../analysis/strategy';
import type { MarketDataMessage } from '../bus/channels';
import type { MessageBus } from '../bus/messageBus';
import type { AppContext } from '../context';
import { BusAgent } from './busAgent';

export class MarketAnalystAgent extends BusAgent {
  constructor(
    ctx: AppContext,
    bus: MessageBus,
    private readonly strategy: SignalStrategy,
  ) {
    super('market-analyst', bus, ctx.logger);
  }

  protected attach(): void {
    this.listen('market_data', (message) => this.analyze(message));
  }

  analyze(message: MarketDataMessage): void {
    const signals = this.strategy.evaluate(message.symbol, message.candles);
    for (const signal of signals) {
      this.logger.info(
        `📈 ${signal.strategy} ${signal.direction} ${signal.symbol} @ ${signal.price} (confidence ${signal.confidence.toFixed(2)})`,
      );
      this.bus.publish('trading_signals', { signal, market: message.state });
    }
  }
}
