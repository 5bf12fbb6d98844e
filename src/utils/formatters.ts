// Number formatting and report lines for terminal output

import type { BestBidOffer, OutputFormat, TradeReport } from '../types';

export function formatPrice(price: number): string {
  if (!price || isNaN(price)) return '-';

  // Adaptive precision based on price magnitude
  const magnitude = Math.abs(price);
  if (magnitude >= 100) return price.toFixed(2);    // BTC, ETH
  if (magnitude >= 1) return price.toFixed(4);
  if (magnitude >= 0.01) return price.toFixed(6);
  return price.toFixed(8);                        // Micro-cap pairs
}

/**
 * Format a base-asset quantity
 *
 * Crypto sizes go down to dust, so small amounts get more decimals.
 */
export function formatAmount(amount: number): string {
  if (!amount || isNaN(amount)) return '-';
  const magnitude = Math.abs(amount);
  if (magnitude >= 1) return amount.toFixed(4);
  if (magnitude >= 0.01) return amount.toFixed(6);
  return amount.toFixed(8);
}

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCurrency(value: number): string {
  if (!value || isNaN(value)) return '$0.00';
  return currencyFormatter.format(value);
}

export function formatTradeLine(report: TradeReport, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify({ type: 'trade', ...report });
  }
  return `TRADE price=${formatPrice(report.price)} amount=${formatAmount(report.amount)} maker=${report.makerSide} notional=${formatCurrency(report.notional)}`;
}

export function formatBboLine(bbo: BestBidOffer, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify({ type: 'bbo', ...bbo });
  }
  const bid = `${formatPrice(bbo.bestBid)} x ${formatAmount(bbo.bidAmountRemaining)}`;
  const ask = `${formatPrice(bbo.bestOffer)} x ${formatAmount(bbo.askAmountRemaining)}`;
  return `BBO bid=${bid} | ask=${ask}`;
}
