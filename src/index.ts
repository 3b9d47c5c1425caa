#!/usr/bin/env node
// tradehive - supervised multi-agent trading pipeline

import { CHANNELS } from './bus/channels';
import { BusHub } from './bus/hub';
import { MessageBus } from './bus/messageBus';
import { tailChannels } from './bus/monitor';
import { WebSocketTransport } from './bus/websocketTransport';
import { loadConfig } from './config';
import type { Config } from './config';
import type { AppContext } from './context';
import { ConfigError, errorMessage } from './errors';
import { createLogger } from './logger';
import { createSystem } from './system';

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

async function runHub(ctx: AppContext): Promise<void> {
  const hub = new BusHub(ctx.logger.child('hub'));
  await hub.listen(ctx.config.bus.port);

  const close = (): void => {
    ctx.logger.info('🛑 Stopping bus hub...');
    hub.close().then(
      () => process.exit(0),
      (error: unknown) => {
        ctx.logger.error(`Hub close failed: ${errorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', close);
  process.once('SIGTERM', close);
}

async function runMonitor(ctx: AppContext): Promise<void> {
  const { bus: busConfig } = ctx.config;
  const logger = ctx.logger.child('monitor');
  const transport = new WebSocketTransport(
    {
      url: busConfig.url,
      reconnectDelayMs: busConfig.reconnectDelay * 1000,
      maxReconnectAttempts: busConfig.maxReconnectAttempts,
    },
    ctx.logger.child('bus'),
  );
  const bus = new MessageBus(transport, ctx.logger.child('bus'), { historySize: 1 });
  const untail = tailChannels(bus, (text) => logger.info(text));

  const close = (): void => {
    untail();
    bus.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Monitor close failed: ${errorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', close);
  process.once('SIGTERM', close);

  await bus.connect();
  logger.info(`👀 Monitoring ${CHANNELS.join(', ')} on ${busConfig.url}`);
}

async function runSystem(ctx: AppContext): Promise<void> {
  const { logger } = ctx;
  logger.info('🤖 Trading system starting...');

  const system = createSystem(ctx);

  let exitCode = 0;
  const shutdown = (reason: string, code = 0): void => {
    exitCode = Math.max(exitCode, code);
    system.supervisor
      .shutdown(reason)
      .then(() => system.bus.close())
      .then(
        () => process.exit(exitCode),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        },
      );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.stack ?? error.message}`);
    shutdown('uncaught exception', 1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    shutdown('unhandled rejection', 1);
  });

  await system.bus.connect();
  await system.supervisor.start();
  logger.info(`✅ Running on ${ctx.config.tradingPairs.join(', ')} (${system.exchange.name})`);
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'start';
  const config = readConfig();
  const ctx: AppContext = { config, logger: createLogger({ level: config.logging.level }) };

  switch (command) {
    case 'start':
      await runSystem(ctx);
      break;
    case 'hub':
      await runHub(ctx);
      break;
    case 'monitor':
      await runMonitor(ctx);
      break;
    default:
      ctx.logger.error(`Unknown command '${command}' (expected: start | hub | monitor)`);
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(`❌ Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
