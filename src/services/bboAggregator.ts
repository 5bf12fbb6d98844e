// Best bid/offer state - folds quote events into one top-of-book record

import type { BestBidOffer, Quote } from '../types';

type BboListener = (snapshot: BestBidOffer) => void;

export const EMPTY_BBO: BestBidOffer = Object.freeze({
  bestBid: 0,
  bestOffer: 0,
  bidAmountRemaining: 0,
  askAmountRemaining: 0,
});

/**
 * Top-of-book aggregator
 *
 * The current record is frozen and swapped out whole on every update, so a
 * snapshot someone else is holding never changes under them and price and
 * remaining for a side always come from the same quote.
 *
 * Bid and ask are tracked independently. We don't check for a crossed book -
 * that's the feed's problem, not ours.
 */
export class BboAggregator {
  private current: BestBidOffer = EMPTY_BBO;
  private listeners: BboListener[] = [];
  private applied: number = 0;

  /**
   * Apply one quote and report the resulting snapshot
   *
   * Quotes with an unknown side leave the book alone but still get reported.
   */
  apply(quote: Quote): BestBidOffer {
    switch (quote.side) {
      case 'bid':
        this.current = Object.freeze({
          ...this.current,
          bestBid: quote.price,
          bidAmountRemaining: quote.remaining,
        });
        break;
      case 'ask':
        this.current = Object.freeze({
          ...this.current,
          bestOffer: quote.price,
          askAmountRemaining: quote.remaining,
        });
        break;
      case 'unknown':
        break;
    }

    this.applied++;
    const snapshot = this.current;
    this.listeners.forEach(cb => cb(snapshot));
    return snapshot;
  }

  snapshot(): BestBidOffer {
    return this.current;
  }

  get updateCount(): number {
    return this.applied;
  }

  /**
   * Register a snapshot listener, returns an unsubscribe function
   */
  onUpdate(listener: BboListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(cb => cb !== listener);
    };
  }
}
