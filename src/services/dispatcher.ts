// Routes decoded events - trades to the reporter, quotes through the BBO aggregator

import { BboAggregator } from './bboAggregator';
import type { Reporter } from './reporter';
import { toTradeReport } from '../utils/calculations';
import type { MarketMessage, StreamStats } from '../types';

export class MarketEventDispatcher {
  private stats: StreamStats = {
    messages: 0,
    trades: 0,
    quotes: 0,
    unknown: 0,
    malformed: 0,
  };
  private detach: () => void;

  constructor(
    private readonly aggregator: BboAggregator,
    private readonly reporter: Reporter,
  ) {
    // One BBO report per applied quote, including unknown-side no-ops
    this.detach = aggregator.onUpdate(snapshot => this.reporter.reportBbo(snapshot));
  }

  /**
   * Process every event in one message, in wire order
   *
   * Runs to completion synchronously, so the next frame can't interleave.
   * Trades never touch the book.
   */
  dispatch(message: MarketMessage): void {
    this.stats.messages++;

    for (const event of message.events) {
      switch (event.type) {
        case 'trade':
          this.stats.trades++;
          this.reporter.reportTrade(toTradeReport(event.trade));
          break;
        case 'quote':
          this.stats.quotes++;
          this.aggregator.apply(event.quote);
          break;
        case 'unknown':
          this.stats.unknown++;
          break;
      }
    }
  }

  /**
   * Count a frame that failed to decode
   */
  recordMalformed(): void {
    this.stats.malformed++;
  }

  getStats(): StreamStats {
    return { ...this.stats };
  }

  dispose(): void {
    this.detach();
  }
}
