// Status HTTP server - read-only view of the stream for monitoring

import express from 'express';
import http from 'http';
import cors from 'cors';
import type { BboAggregator } from './services/bboAggregator';
import type { MarketEventDispatcher } from './services/dispatcher';
import { computeMidPrice, computeSpread } from './utils/calculations';

export interface StatusSources {
  symbol: string;
  aggregator: BboAggregator;
  dispatcher: MarketEventDispatcher;
  isConnected: () => boolean;
}

/**
 * Build the express app
 *
 * Handlers only ever read frozen BBO snapshots, never the aggregator's state.
 */
export function createStatusApp(sources: StatusSources): express.Express {
  const app = express();

  app.use(cors());

  // Simple health check - useful for monitoring and load balancers
  app.get('/health', (_req, res) => {
    res.json({
      status: sources.isConnected() ? 'ok' : 'disconnected',
      symbol: sources.symbol,
      connected: sources.isConnected(),
      stats: sources.dispatcher.getStats(),
    });
  });

  app.get('/api/bbo', (_req, res) => {
    const snapshot = sources.aggregator.snapshot();
    res.json({
      symbol: sources.symbol,
      ...snapshot,
      spread: computeSpread(snapshot),
      midPrice: computeMidPrice(snapshot),
      updates: sources.aggregator.updateCount,
    });
  });

  return app;
}

/**
 * Start listening - port 0 picks a free port
 */
export function startStatusServer(app: express.Express, port: number): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once('error', reject);
    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      console.log(`[Status] Listening on http://localhost:${boundPort} (/health, /api/bbo)`);
      resolve(server);
    });
  });
}
