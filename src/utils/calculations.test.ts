import { describe, it, expect } from 'vitest';
import { computeMidPrice, computeNotional, computeSpread, toTradeReport } from './calculations';

describe('calculations', () => {
  it('computes notional as amount times price', () => {
    expect(computeNotional({ price: 100.5, amount: 2, makerSide: 'bid' })).toBe(201);
    expect(computeNotional({ price: 50000, amount: 0.5, makerSide: 'unknown' })).toBe(25000);
  });

  it('builds a trade report', () => {
    expect(toTradeReport({ price: 20, amount: 3, makerSide: 'ask' })).toEqual({
      price: 20,
      amount: 3,
      makerSide: 'ask',
      notional: 60,
    });
  });

  it('computes spread and mid once both sides are known', () => {
    const bbo = { bestBid: 50000, bestOffer: 50010, bidAmountRemaining: 1, askAmountRemaining: 1 };
    expect(computeSpread(bbo)).toBe(10);
    expect(computeMidPrice(bbo)).toBe(50005);
  });

  it('returns null while a side is still empty', () => {
    const bbo = { bestBid: 50000, bestOffer: 0, bidAmountRemaining: 1, askAmountRemaining: 0 };
    expect(computeSpread(bbo)).toBeNull();
    expect(computeMidPrice(bbo)).toBeNull();
  });
});
