import { DataCollectorAgent } from './agents/dataCollectorAgent';
import { ExecutionAgent } from './agents/executionAgent';
import { MarketAnalystAgent } from './agents/marketAnalystAgent';
import { PortfolioAgent } from './agents/portfolioAgent';
import { RiskManagerAgent } from './agents/riskManagerAgent';
import { TechnicalStrategy } from './analysis/strategy';
import { MessageBus } from './bus/messageBus';
import { LocalTransport } from './bus/transport';
import type { Transport } from './bus/transport';
import { WebSocketTransport } from './bus/websocketTransport';
import type { AppContext } from './context';
import { TelegramController } from './controllers/telegramController';
import { ExecutionPipeline } from './engine/executionPipeline';
import { createExchange } from './exchange/factory';
import type { ExchangeClient } from './exchange/types';
import { createNotifier } from './notifications';
import type { NotificationSink } from './notifications';
import { PortfolioLedger } from './portfolio/ledger';
import { defaultGuards } from './risk/guards';
import { RiskSizer } from './risk/riskSizer';
import { Supervisor } from './supervisor/supervisor';

export interface SystemOverrides {
  transport?: Transport;
  exchange?: ExchangeClient;
  notifier?: NotificationSink;
}

export interface TradingSystem {
  bus: MessageBus;
  ledger: PortfolioLedger;
  exchange: ExchangeClient;
  pipeline: ExecutionPipeline;
  supervisor: Supervisor;
}

export function createTransport(ctx: AppContext): Transport {
  const { bus } = ctx.config;
  if (bus.transport === 'websocket') {
    return new WebSocketTransport(
      { url: bus.url, reconnectDelayMs: bus.reconnectDelay * 1000, maxReconnectAttempts: bus.maxReconnectAttempts },
      ctx.logger.child('bus'),
    );
  }
  return new LocalTransport();
}

/**
 * Wires every component and registers the agent factories. Factories close
 * over the shared ledger, pipeline and exchange, so a restarted agent keeps
 * working on the same process-wide state.
 */
export function createSystem(ctx: AppContext, overrides: SystemOverrides = {}): TradingSystem {
  const { config, logger } = ctx;

  const bus = new MessageBus(overrides.transport ?? createTransport(ctx), logger.child('bus'), {
    historySize: config.bus.historySize,
  });
  const notifier = overrides.notifier ?? createNotifier(config.telegram, logger.child('notify'));
  const exchange = overrides.exchange ?? createExchange(config, logger);

  const ledger = new PortfolioLedger({
    initialCapital: config.initialCapital,
    maxPositionWeight: config.rebalanceThreshold,
    varConfidence: config.riskManagement.varConfidence,
    tradeHistorySize: config.portfolio.tradeHistorySize,
  });

  const pipeline = new ExecutionPipeline(exchange, bus, notifier, logger.child('pipeline'), {
    retryAttempts: config.execution.retryAttempts,
    retryDelayMs: config.execution.retryDelay * 1000,
    monitorIntervalMs: config.execution.monitorInterval * 1000,
    closedBracketHistory: config.execution.closedBracketHistory,
  });

  const risk = config.riskManagement;
  const sizer = new RiskSizer({
    minConfidence: config.analysis.minConfidence,
    maxPositionSize: risk.maxPositionSize,
    defaultWinRate: risk.defaultWinRate,
    minTradesForStats: risk.minTradesForStats,
    stopAtrMultiplier: risk.stopAtrMultiplier,
    takeProfitAtrMultiplier: risk.takeProfitAtrMultiplier,
  });
  const guards = defaultGuards({
    maxPositions: risk.maxPositions,
    maxTotalExposure: risk.maxTotalExposure,
    riskTolerance: risk.riskTolerance,
    maxDrawdown: risk.maxDrawdown,
  });
  const strategy = new TechnicalStrategy({
    rsiPeriod: config.analysis.rsiPeriod,
    rsiOversold: config.analysis.rsiOversold,
    rsiOverbought: config.analysis.rsiOverbought,
  });

  const supervisor = new Supervisor(
    { bus, ledger, notifier, logger },
    {
      healthIntervalMs: config.monitoringInterval * 1000,
      statusIntervalMs: config.supervisor.statusInterval * 1000,
      stopTimeoutMs: config.supervisor.stopTimeout * 1000,
    },
  );

  // Consumers first, so the first market_data cycle already has listeners.
  supervisor.register('portfolio', () => new PortfolioAgent(ctx, bus, ledger, notifier));
  supervisor.register('execution', () => new ExecutionAgent(ctx, bus, pipeline, exchange, ledger));
  supervisor.register('risk-manager', () => new RiskManagerAgent(ctx, bus, ledger, sizer, guards));
  supervisor.register('market-analyst', () => new MarketAnalystAgent(ctx, bus, strategy));
  supervisor.register('data-collector', () => new DataCollectorAgent(ctx, bus, exchange));
  if (config.telegram) {
    supervisor.register('telegram', () => new TelegramController(ctx, ledger, pipeline));
  }

  return { bus, ledger, exchange, pipeline, supervisor };
}
