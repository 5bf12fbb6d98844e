// Shared types for decoded market events, top-of-book state, and adapters

export type MarketSide = 'bid' | 'ask' | 'unknown';

export type MessageKind = 'trade' | 'change' | 'unknown';

/**
 * Order book change at one price level
 *
 * With top_of_book=true Gemini only sends changes to the best level on each
 * side, so every quote is a candidate top-of-book update.
 */
export interface Quote {
  price: number;
  reason: string;          // "place", "cancel", "trade", "initial" - empty if not sent
  remaining: number;       // Quantity left at this price level
  side: MarketSide;
  delta?: number;          // Absent on "initial" events; 0 is a real value
}

/**
 * Matched trade from the feed
 */
export interface Trade {
  price: number;
  amount: number;          // Base asset qty (e.g. 0.5 BTC)
  makerSide: MarketSide;   // Side of the resting order that got hit
}

export type MarketEvent =
  | { type: 'trade'; trade: Trade }
  | { type: 'quote'; quote: Quote }
  | { type: 'unknown' };

/**
 * One decoded update frame
 *
 * Events keep the order they had on the wire. Both timestamps can be missing
 * (the first frame after connecting usually has neither).
 */
export interface MarketMessage {
  eventId: number;
  events: MarketEvent[];
  timestamp?: number;      // Unix seconds
  timestampms?: number;    // Unix ms
  socketSequence: number;
}

/**
 * Top-of-book snapshot
 *
 * Zero means "nothing seen yet" as well as a real zero - the feed never
 * tells the two apart and neither do we.
 */
export interface BestBidOffer {
  readonly bestBid: number;
  readonly bestOffer: number;
  readonly bidAmountRemaining: number;
  readonly askAmountRemaining: number;
}

export interface TradeReport {
  price: number;
  amount: number;
  makerSide: MarketSide;
  notional: number;        // amount * price, in quote currency
}

/**
 * Symbol validation result
 */
export interface SymbolInfo {
  symbol: string;
  valid: boolean;
  error?: string;
}

/**
 * Interface that exchange adapters implement
 *
 * Register handlers before calling connect(). Adapters hand out decoded
 * messages only - dispatching the events is the caller's job.
 */
export interface MarketDataAdapter {
  name: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  onMessage(callback: (message: MarketMessage) => void): void;
  onError(callback: (error: Error) => void): void;
  onConnect(callback: () => void): void;
  onDisconnect(callback: () => void): void;

  validateSymbol(symbol: string): Promise<SymbolInfo>;
}

/**
 * Gemini connection config
 *
 * The market data feed is public, no keys needed. URLs can be overridden to
 * point at a local server.
 */
export interface GeminiConfig {
  symbol: string;
  sandbox?: boolean;
  wsBaseUrl?: string;
  restBaseUrl?: string;
  connectTimeoutMs?: number;
  maxReconnectAttempts?: number;
  reconnectDelayMs?: number;
}

export type OutputFormat = 'text' | 'json';

export interface StreamStats {
  messages: number;
  trades: number;
  quotes: number;
  unknown: number;
  malformed: number;
}
