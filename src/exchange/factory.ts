import type { Config } from '../config';
import type { Logger } from '../logger';
import { CcxtExchange } from './ccxtExchange';
import { PaperExchange } from './paperExchange';
import type { ExchangeClient } from './types';

/**
 * Paper mode reads public market data from the configured venue without
 * credentials and keeps orders in process.
 */
export function createExchange(config: Config, logger: Logger): ExchangeClient {
  const venue = config.exchange.id.toLowerCase();

  if (config.exchange.paper) {
    logger.info(`📄 Paper trading on ${venue} market data`);
    return new PaperExchange(new CcxtExchange({ id: venue, testnet: false }));
  }

  logger.info(`🏦 Live trading on ${venue}${config.exchange.testnet ? ' (testnet)' : ''}`);
  return new CcxtExchange({
    id: venue,
    testnet: config.exchange.testnet,
    apiKey: config.api.key,
    secret: config.api.secret,
  });
}
