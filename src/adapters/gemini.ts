// Gemini v1 market data adapter - one symbol, top of book plus trades

import WebSocket from 'ws';
import axios from 'axios';
import { BaseAdapter } from './base';
import { decodeMarketMessage } from '../decoder';
import { isDecodeError } from '../errors';
import { GeminiConfig, MarketMessage, SymbolInfo } from '../types';

const SNIPPET_LENGTH = 120;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class GeminiAdapter extends BaseAdapter {
  name = 'Gemini';

  private symbol: string;
  private ws: WebSocket | null = null;
  private wsBaseUrl: string;
  private restBaseUrl: string;
  private connectTimeoutMs: number;
  private closing: boolean = false;  // Set by disconnect() so close doesn't trigger a reconnect
  private frameCount: number = 0;
  private lastSequence: number | null = null;
  private gaps: number = 0;

  constructor(config: GeminiConfig) {
    super({
      maxReconnectAttempts: config.maxReconnectAttempts,
      reconnectDelayMs: config.reconnectDelayMs,
    });
    this.symbol = config.symbol;
    this.connectTimeoutMs = config.connectTimeoutMs ?? 10000;

    // Sandbox mirrors production, handy when prod is rate limiting us
    this.wsBaseUrl = config.wsBaseUrl ?? (config.sandbox
      ? 'wss://api.sandbox.gemini.com/v1/marketdata'
      : 'wss://api.gemini.com/v1/marketdata');

    this.restBaseUrl = config.restBaseUrl ?? (config.sandbox
      ? 'https://api.sandbox.gemini.com/v1'
      : 'https://api.gemini.com/v1');
  }

  /**
   * Stream URL for the configured symbol
   *
   * top_of_book=true limits change events to the best level on each side.
   * Trades are on by default.
   */
  get streamUrl(): string {
    return `${this.wsBaseUrl}/${this.symbol}?top_of_book=true`;
  }

  get sequenceGaps(): number {
    return this.gaps;
  }

  /**
   * Open the WebSocket and wait for it to be ready
   *
   * The ws library answers server pings on its own, so there's no heartbeat
   * handling here.
   */
  async connect(): Promise<void> {
    this.closing = false;
    return this.open();
  }

  protected shouldReconnect(): boolean {
    return !this.closing;
  }

  // Leaves `closing` alone so a disconnect() during the handshake sticks
  protected reconnect(): Promise<void> {
    return this.open();
  }

  private open(): Promise<void> {
    console.log(`[Gemini] Connecting to ${this.streamUrl}...`);

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.streamUrl);
      let opened = false;
      this.ws = ws;

      // Don't hang forever if connection fails
      const timeout = setTimeout(() => {
        if (!opened) {
          ws.terminate();
          reject(new Error('Connection timeout'));
        }
      }, this.connectTimeoutMs);

      ws.on('open', () => {
        opened = true;
        clearTimeout(timeout);
        // socket_sequence starts over on every connection
        this.lastSequence = null;
        this.frameCount = 0;
        console.log('[Gemini] WebSocket handshake completed');
        this.emitConnect();
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleFrame(toBuffer(data));
      });

      ws.on('error', (error: Error) => {
        console.error('[Gemini] WebSocket error:', error.message);
        clearTimeout(timeout);
        this.emitError(error);
        reject(error);
      });

      ws.on('close', () => {
        clearTimeout(timeout);
        if (!opened) return;  // Failed handshake - connect() already rejected
        console.log('[Gemini] WebSocket closed');
        if (this.ws === ws) this.ws = null;
        this.emitDisconnect();
        // No-op after an intentional disconnect
        this.attemptReconnect();
      });
    });
  }

  /**
   * Decode one frame and hand it to listeners
   *
   * A bad frame is logged and skipped - one broken message shouldn't take
   * the stream down.
   */
  private handleFrame(data: Buffer): void {
    const frame = this.frameCount++;
    if (data.length === 0) return;

    let message: MarketMessage;
    try {
      message = decodeMarketMessage(data);
    } catch (error) {
      if (!isDecodeError(error)) throw error;
      const raw = data.toString('utf8');
      const snippet = raw.length > SNIPPET_LENGTH ? `${raw.slice(0, SNIPPET_LENGTH)}...` : raw;
      console.error(`[Gemini] Dropping frame #${frame}: ${error.message} - ${snippet}`);
      this.emitError(error);
      return;
    }

    this.checkSequence(message.socketSequence);
    this.emitMessage(message);
  }

  /**
   * Warn when socket_sequence skips - means we lost frames and the book
   * may be stale until the next change on that side
   */
  private checkSequence(sequence: number): void {
    if (this.lastSequence !== null && sequence !== this.lastSequence + 1) {
      this.gaps++;
      console.warn(`[Gemini] Sequence gap: expected ${this.lastSequence + 1}, got ${sequence}`);
    }
    this.lastSequence = sequence;
  }

  /**
   * Close the WebSocket connection and clean up
   */
  async disconnect(): Promise<void> {
    console.log('[Gemini] Disconnecting...');

    this.closing = true;
    this.clearReconnectTimer();

    const ws = this.ws;
    this.ws = null;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>(resolve => {
        ws.once('close', () => resolve());
        ws.close();
      });
    }

    console.log('[Gemini] Disconnected');
  }

  /**
   * Check the symbol is listed on Gemini
   *
   * /v1/symbols returns a flat array of lowercase symbol names.
   */
  async validateSymbol(symbol: string): Promise<SymbolInfo> {
    const lowerSymbol = symbol.toLowerCase();

    try {
      const response = await axios.get<string[]>(`${this.restBaseUrl}/symbols`);
      const listed = Array.isArray(response.data) && response.data.includes(lowerSymbol);
      return {
        symbol: lowerSymbol,
        valid: listed,
        error: listed ? undefined : 'Symbol not found on Gemini',
      };
    } catch (error) {
      return {
        symbol: lowerSymbol,
        valid: false,
        error: error instanceof Error ? error.message : 'Failed to validate symbol',
      };
    }
  }
}
