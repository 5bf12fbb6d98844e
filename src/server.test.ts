import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import http from 'http';
import { createStatusApp, startStatusServer } from './server';
import { BboAggregator } from './services/bboAggregator';
import { MarketEventDispatcher } from './services/dispatcher';
import type { Reporter } from './services/reporter';

const silentReporter: Reporter = {
  reportTrade: () => {},
  reportBbo: () => {},
};

describe('status server', () => {
  let server: http.Server;
  let baseUrl: string;
  let aggregator: BboAggregator;
  let dispatcher: MarketEventDispatcher;
  let connected: boolean;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    aggregator = new BboAggregator();
    dispatcher = new MarketEventDispatcher(aggregator, silentReporter);
    connected = true;

    const app = createStatusApp({
      symbol: 'btcusd',
      aggregator,
      dispatcher,
      isConnected: () => connected,
    });
    server = await startStatusServer(app, 0);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await new Promise(resolve => server.close(resolve));
  });

  it('reports health with stream stats', async () => {
    dispatcher.dispatch({
      eventId: 1,
      socketSequence: 0,
      events: [{ type: 'trade', trade: { price: 1, amount: 1, makerSide: 'bid' } }, { type: 'unknown' }],
    });

    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      symbol: 'btcusd',
      connected: true,
      stats: { messages: 1, trades: 1, quotes: 0, unknown: 1, malformed: 0 },
    });
  });

  it('says disconnected when the feed is down', async () => {
    connected = false;
    const body = await (await fetch(`${baseUrl}/health`)).json();
    expect(body).toMatchObject({ status: 'disconnected', connected: false });
  });

  it('serves the latest BBO snapshot with spread and mid', async () => {
    aggregator.apply({ side: 'bid', price: 50000, remaining: 1.5, reason: '' });
    aggregator.apply({ side: 'ask', price: 50010, remaining: 0.8, reason: '' });

    const res = await fetch(`${baseUrl}/api/bbo`);
    expect(await res.json()).toEqual({
      symbol: 'btcusd',
      bestBid: 50000,
      bestOffer: 50010,
      bidAmountRemaining: 1.5,
      askAmountRemaining: 0.8,
      spread: 10,
      midPrice: 50005,
      updates: 2,
    });
  });

  it('serves nulls for spread and mid before any quotes', async () => {
    const body = await (await fetch(`${baseUrl}/api/bbo`)).json();
    expect(body).toEqual({
      symbol: 'btcusd',
      bestBid: 0,
      bestOffer: 0,
      bidAmountRemaining: 0,
      askAmountRemaining: 0,
      spread: null,
      midPrice: null,
      updates: 0,
    });
  });
});
