// Trade notional and derived top-of-book values

import type { BestBidOffer, Trade, TradeReport } from '../types';

/**
 * Dollar value of a trade: amount * price
 */
export function computeNotional(trade: Trade): number {
  return trade.amount * trade.price;
}

export function toTradeReport(trade: Trade): TradeReport {
  return {
    price: trade.price,
    amount: trade.amount,
    makerSide: trade.makerSide,
    notional: computeNotional(trade),
  };
}

/**
 * Absolute spread: bestOffer - bestBid
 *
 * Null until both sides have been seen (a zero side means no data yet).
 */
export function computeSpread(bbo: BestBidOffer): number | null {
  if (!bbo.bestBid || !bbo.bestOffer) return null;
  return bbo.bestOffer - bbo.bestBid;
}

export function computeMidPrice(bbo: BestBidOffer): number | null {
  if (!bbo.bestBid || !bbo.bestOffer) return null;
  return (bbo.bestBid + bbo.bestOffer) / 2;
}
