#!/usr/bin/env node
// CLI entry - streams one Gemini symbol, prints trades and top of book

import http from 'http';
import dotenv from 'dotenv';
import { GeminiAdapter } from './adapters';
import { loadConfig, StreamConfig, USAGE } from './config';
import { ConfigError, isDecodeError, ReconnectExhaustedError } from './errors';
import { BboAggregator } from './services/bboAggregator';
import { MarketEventDispatcher } from './services/dispatcher';
import { ConsoleReporter } from './services/reporter';
import { createStatusApp, startStatusServer } from './server';

export interface StreamHandle {
  adapter: GeminiAdapter;
  aggregator: BboAggregator;
  dispatcher: MarketEventDispatcher;
  statusServer: http.Server | null;
  stop(): Promise<void>;
}

export interface StreamOptions {
  maxReconnectAttempts?: number;
  reconnectDelayMs?: number;
  // Called once the feed is gone for good - main() exits with code 1
  onFatal?: (error: Error) => void;
}

/**
 * Wire adapter -> dispatcher -> reporter and start streaming
 *
 * Malformed frames are counted and skipped by the adapter; they never stop
 * the stream.
 */
export async function startStream(config: StreamConfig, options: StreamOptions = {}): Promise<StreamHandle> {
  const adapter = new GeminiAdapter({
    symbol: config.symbol,
    sandbox: config.sandbox,
    wsBaseUrl: config.wsBaseUrl,
    restBaseUrl: config.restBaseUrl,
    maxReconnectAttempts: options.maxReconnectAttempts,
    reconnectDelayMs: options.reconnectDelayMs,
  });

  if (config.validateSymbol) {
    const info = await adapter.validateSymbol(config.symbol);
    if (!info.valid) {
      throw new ConfigError(`Cannot stream ${info.symbol}: ${info.error ?? 'invalid symbol'}`);
    }
  }

  const aggregator = new BboAggregator();
  const dispatcher = new MarketEventDispatcher(aggregator, new ConsoleReporter(config.format));

  adapter.onMessage(message => dispatcher.dispatch(message));
  adapter.onError(error => {
    if (isDecodeError(error)) {
      dispatcher.recordMalformed();
    } else if (error instanceof ReconnectExhaustedError) {
      console.error(`[Stream] Feed lost: ${error.message}`);
      options.onFatal?.(error);
    }
  });
  adapter.onDisconnect(() => {
    console.log('[Stream] Feed disconnected');
  });

  let statusServer: http.Server | null = null;
  if (config.statusPort !== null) {
    const app = createStatusApp({
      symbol: config.symbol,
      aggregator,
      dispatcher,
      isConnected: () => adapter.isConnected,
    });
    statusServer = await startStatusServer(app, config.statusPort);
  }

  try {
    await adapter.connect();
  } catch (error) {
    statusServer?.close();
    throw error;
  }

  return {
    adapter,
    aggregator,
    dispatcher,
    statusServer,
    async stop() {
      await adapter.disconnect();
      dispatcher.dispose();
      if (statusServer) {
        const server = statusServer;
        await new Promise<void>(resolve => server.close(() => resolve()));
      }
    },
  };
}

async function main(): Promise<void> {
  dotenv.config();

  let config: StreamConfig | null;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }

  if (!config) {
    console.log(USAGE);
    return;
  }

  console.log(`[Stream] Starting ${config.symbol}${config.sandbox ? ' (sandbox)' : ''}`);
  const handle = await startStream(config, {
    onFatal: () => {
      const stats = handle.dispatcher.getStats();
      console.error(`[Stream] Stopped after ${stats.messages} messages`);
      handle.stop().then(
        () => process.exit(1),
        error => {
          console.error('[Stream] Shutdown failed:', error);
          process.exit(1);
        },
      );
    },
  });

  // Clean shutdown - close the feed and status server gracefully
  const shutdown = async () => {
    console.log('\n[Stream] Shutting down...');
    const stats = handle.dispatcher.getStats();
    console.log(`[Stream] ${stats.messages} messages, ${stats.trades} trades, ${stats.quotes} quotes, ${stats.malformed} malformed`);
    await handle.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      console.error('[Stream] Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

if (require.main === module) {
  main().catch(error => {
    console.error('[Stream] Fatal:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
