// Reporting sink - turns trade reports and BBO snapshots into output lines

import type { Writable } from 'stream';
import { formatBboLine, formatTradeLine } from '../utils/formatters';
import type { BestBidOffer, OutputFormat, TradeReport } from '../types';

export interface Reporter {
  reportTrade(report: TradeReport): void;
  reportBbo(snapshot: BestBidOffer): void;
}

/**
 * Writes one line per report to stdout (or any writable stream)
 */
export class ConsoleReporter implements Reporter {
  constructor(
    private readonly format: OutputFormat = 'text',
    private readonly out: Writable = process.stdout,
  ) {}

  reportTrade(report: TradeReport): void {
    this.out.write(formatTradeLine(report, this.format) + '\n');
  }

  reportBbo(snapshot: BestBidOffer): void {
    this.out.write(formatBboLine(snapshot, this.format) + '\n');
  }
}
