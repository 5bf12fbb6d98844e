// Base adapter class - callback system and reconnect handling for feed connections

import { ReconnectExhaustedError } from '../errors';
import { MarketDataAdapter, MarketMessage, SymbolInfo } from '../types';

export interface ReconnectOptions {
  maxReconnectAttempts?: number;
  reconnectDelayMs?: number;
}

export abstract class BaseAdapter implements MarketDataAdapter {
  abstract name: string;

  protected connected: boolean = false;

  // Callback arrays for each event type
  private messageCallbacks: ((message: MarketMessage) => void)[] = [];
  private errorCallbacks: ((error: Error) => void)[] = [];
  private connectCallbacks: (() => void)[] = [];
  private disconnectCallbacks: (() => void)[] = [];

  // Reconnection handling
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts: number = 0;
  private maxReconnectAttempts: number;
  private reconnectDelay: number; // Base delay in ms

  constructor(options: ReconnectOptions = {}) {
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
    this.reconnectDelay = options.reconnectDelayMs ?? 1000;
  }

  // These must be implemented by subclasses
  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract validateSymbol(symbol: string): Promise<SymbolInfo>;

  get isConnected(): boolean {
    return this.connected;
  }

  // Register event listeners
  onMessage(callback: (message: MarketMessage) => void): void {
    this.messageCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  onConnect(callback: () => void): void {
    this.connectCallbacks.push(callback);
  }

  onDisconnect(callback: () => void): void {
    this.disconnectCallbacks.push(callback);
  }

  // Emit events to all registered listeners
  protected emitMessage(message: MarketMessage): void {
    this.messageCallbacks.forEach(cb => cb(message));
  }

  protected emitError(error: Error): void {
    this.errorCallbacks.forEach(cb => cb(error));
  }

  protected emitConnect(): void {
    this.connected = true;
    this.reconnectAttempts = 0; // Reset counter on successful connect
    this.connectCallbacks.forEach(cb => cb());
  }

  protected emitDisconnect(): void {
    this.connected = false;
    this.disconnectCallbacks.forEach(cb => cb());
  }

  /**
   * Attempt to reconnect with exponential backoff
   *
   * Delay doubles each attempt: 1s -> 2s -> 4s -> 8s -> 16s...
   * Gives up after maxReconnectAttempts.
   */
  protected attemptReconnect(): void {
    if (!this.shouldReconnect()) return;

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      console.error(`[${this.name}] Max reconnect attempts reached`);
      this.emitError(new ReconnectExhaustedError(this.name, this.reconnectAttempts));
      return;
    }

    const delay = this.reconnectDelay * Math.pow(2, this.reconnectAttempts);
    this.reconnectAttempts++;

    console.log(`[${this.name}] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);

    this.reconnectTimer = setTimeout(async () => {
      this.reconnectTimer = null;
      if (!this.shouldReconnect()) return;
      try {
        await this.reconnect();
      } catch (error) {
        if (!this.shouldReconnect()) return;
        console.error(`[${this.name}] Reconnect failed:`, error);
        this.attemptReconnect();
      }
    }, delay);
  }

  /**
   * False once the caller has asked to disconnect
   */
  protected shouldReconnect(): boolean {
    return true;
  }

  /**
   * Reopen the connection after a drop - subclasses override this when
   * connect() resets state a reconnect must keep
   */
  protected reconnect(): Promise<void> {
    return this.connect();
  }

  protected clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
