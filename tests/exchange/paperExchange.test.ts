import { describe, it, expect } from 'vitest';
import { ExchangeError } from '../../src/errors';
import { PaperExchange } from '../../src/exchange/paperExchange';
import { isPriceFeedAware } from '../../src/exchange/types';
import { ScriptedExchange, candle } from '../helpers';

describe('PaperExchange', () => {
  it('fills market orders at the last known price', async () => {
    const exchange = new PaperExchange();
    exchange.updatePrice('BTC/USDT', 30000);

    const order = await exchange.createOrder({ symbol: 'BTC/USDT', type: 'market', side: 'BUY', quantity: 0.1, price: 29000 });

    expect(order).toMatchObject({ status: 'filled', fillPrice: 30000, quantity: 0.1 });
  });

  it('rejects a market order without any price', async () => {
    const exchange = new PaperExchange();
    await expect(
      exchange.createOrder({ symbol: 'BTC/USDT', type: 'market', side: 'BUY', quantity: 1 }),
    ).rejects.toBeInstanceOf(ExchangeError);
  });

  it('triggers a long stop when the price falls through it', async () => {
    const exchange = new PaperExchange();
    exchange.updatePrice('BTC/USDT', 100);
    const stop = await exchange.createOrder({ symbol: 'BTC/USDT', type: 'stop_loss', side: 'SELL', quantity: 1, price: 95 });
    const target = await exchange.createOrder({ symbol: 'BTC/USDT', type: 'take_profit', side: 'SELL', quantity: 1, price: 110 });

    exchange.updatePrice('BTC/USDT', 96);
    expect((await exchange.fetchOrderStatus(stop.id)).status).toBe('pending');

    exchange.updatePrice('BTC/USDT', 94);
    expect(await exchange.fetchOrderStatus(stop.id)).toMatchObject({ status: 'filled', fillPrice: 94 });
    expect((await exchange.fetchOrderStatus(target.id)).status).toBe('pending');
  });

  it('cancels the other leg of an OCO group when one triggers', async () => {
    const exchange = new PaperExchange();
    exchange.updatePrice('BTC/USDT', 30000);
    const stop = await exchange.createOrder({
      symbol: 'BTC/USDT',
      type: 'stop_loss',
      side: 'SELL',
      quantity: 1,
      price: 29600,
      ocoGroup: 'entry-1',
    });
    const target = await exchange.createOrder({
      symbol: 'BTC/USDT',
      type: 'take_profit',
      side: 'SELL',
      quantity: 1,
      price: 30600,
      ocoGroup: 'entry-1',
    });
    const other = await exchange.createOrder({
      symbol: 'BTC/USDT',
      type: 'stop_loss',
      side: 'SELL',
      quantity: 1,
      price: 29500,
      ocoGroup: 'entry-2',
    });

    exchange.updatePrice('BTC/USDT', 30600);
    exchange.updatePrice('BTC/USDT', 29600);

    expect(await exchange.fetchOrderStatus(target.id)).toMatchObject({ status: 'filled', fillPrice: 30600 });
    expect((await exchange.fetchOrderStatus(target.id)).filledAt).toEqual(expect.any(Number));
    expect((await exchange.fetchOrderStatus(stop.id)).status).toBe('canceled');
    expect((await exchange.fetchOrderStatus(other.id)).status).toBe('pending');
  });

  it('triggers a short take-profit when the price drops to it', async () => {
    const exchange = new PaperExchange();
    const target = await exchange.createOrder({ symbol: 'ETH/USDT', type: 'take_profit', side: 'BUY', quantity: 1, price: 90 });

    exchange.updatePrice('ETH/USDT', 90);
    expect((await exchange.fetchOrderStatus(target.id)).status).toBe('filled');
  });

  it('cancels only pending orders', async () => {
    const exchange = new PaperExchange();
    exchange.updatePrice('BTC/USDT', 100);
    const stop = await exchange.createOrder({ symbol: 'BTC/USDT', type: 'stop_loss', side: 'SELL', quantity: 1, price: 95 });
    await exchange.cancelOrder(stop.id);
    exchange.updatePrice('BTC/USDT', 90);

    expect((await exchange.fetchOrderStatus(stop.id)).status).toBe('canceled');
    await expect(exchange.cancelOrder('missing')).rejects.toBeInstanceOf(ExchangeError);
  });

  it('reads candles from its market data source and learns the last close', async () => {
    const source = new ScriptedExchange();
    source.candles = [candle(100, 0), candle(101, 1)];
    const exchange = new PaperExchange(source);

    expect(await exchange.fetchOHLCV('BTC/USDT', '1m', 2)).toHaveLength(2);
    expect(exchange.lastPrice('BTC/USDT')).toBe(101);
  });

  it('fails data calls without a source', async () => {
    await expect(new PaperExchange().fetchOrderBook('BTC/USDT')).rejects.toThrow(
      'fetchOrderBook failed: paper exchange has no market data source',
    );
  });

  it('is recognized as a price-fed exchange', () => {
    expect(isPriceFeedAware(new PaperExchange())).toBe(true);
    expect(isPriceFeedAware(new ScriptedExchange())).toBe(false);
  });
});
