import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import { ConsoleReporter } from './reporter';

function capture(): { out: Writable; lines: string[] } {
  const lines: string[] = [];
  const out = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { out, lines };
}

describe('ConsoleReporter', () => {
  it('writes one text line per report', () => {
    const { out, lines } = capture();
    const reporter = new ConsoleReporter('text', out);

    reporter.reportTrade({ price: 100.5, amount: 2, makerSide: 'bid', notional: 201 });
    reporter.reportBbo({ bestBid: 100, bestOffer: 101, bidAmountRemaining: 1, askAmountRemaining: 2 });

    expect(lines).toEqual([
      'TRADE price=100.50 amount=2.0000 maker=bid notional=$201.00\n',
      'BBO bid=100.00 x 1.0000 | ask=101.00 x 2.0000\n',
    ]);
  });

  it('writes JSON lines', () => {
    const { out, lines } = capture();
    const reporter = new ConsoleReporter('json', out);

    reporter.reportBbo({ bestBid: 1, bestOffer: 2, bidAmountRemaining: 3, askAmountRemaining: 4 });

    expect(lines).toEqual([
      '{"type":"bbo","bestBid":1,"bestOffer":2,"bidAmountRemaining":3,"askAmountRemaining":4}\n',
    ]);
  });
});
