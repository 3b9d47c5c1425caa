import { describe, expect, it } from 'vitest';
import { createExchange } from '../../src/exchange/factory';
import { PaperExchange } from '../../src/exchange/paperExchange';
import { silentLogger } from '../../src/logger';
import { testConfig } from '../helpers';

describe('createExchange', () => {
  it('wraps the venue in a paper exchange by default', () => {
    const exchange = createExchange(testConfig(), silentLogger());

    expect(exchange).toBeInstanceOf(PaperExchange);
    expect(exchange.name).toBe('paper');
  });

  it('rejects a venue it has no adapter for', () => {
    const config = testConfig({ exchange: { id: 'nowhere' } });

    expect(() => createExchange(config, silentLogger())).toThrow(
      "init failed: unsupported exchange 'nowhere' (supported: binance, bybit, kraken, kucoin, okx)",
    );
  });
});
