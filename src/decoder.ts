// Gemini v1 market data decoder - raw frame to typed MarketMessage

import { MalformedEventFieldError, MalformedMessageError } from './errors';
import { MarketEvent, MarketMessage, MarketSide, MessageKind, Quote, Trade } from './types';

type JsonObject = Record<string, unknown>;

const MAX_U32 = 0xffffffff;

// Full decimal literal only - parseFloat("12abc") would happily return 12
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Non-negative whole number, any size
 *
 * eventId is a u64 on Gemini's side. JSON.parse rounds values past 2^53 to
 * the nearest double, so very large ids lose their low digits - fine for
 * logging, not for equality checks.
 */
function isUnsignedInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Parse a price/quantity string
 *
 * Gemini sends every number as a string to avoid float precision loss on
 * their side. Returns null when the text isn't a complete decimal literal.
 */
export function parseDecimal(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function parseMarketSide(value: string): MarketSide {
  switch (value) {
    case 'bid':
      return 'bid';
    case 'ask':
      return 'ask';
    default:
      return 'unknown';
  }
}

export function parseMessageKind(value: string): MessageKind {
  switch (value) {
    case 'trade':
      return 'trade';
    case 'change':
      return 'change';
    default:
      return 'unknown';
  }
}

function requireString(event: JsonObject, index: number, field: string): string {
  const value = event[field];
  if (value === undefined) {
    throw new MalformedEventFieldError(index, field, 'missing');
  }
  if (typeof value !== 'string') {
    throw new MalformedEventFieldError(index, field, `expected string, got ${typeof value}`);
  }
  return value;
}

function requireDecimal(event: JsonObject, index: number, field: string): number {
  const text = requireString(event, index, field);
  const value = parseDecimal(text);
  if (value === null) {
    throw new MalformedEventFieldError(index, field, `not a decimal: "${text}"`);
  }
  return value;
}

// Optional numeric fields: missing or non-string falls back, a bad string does not
function optionalDecimal(event: JsonObject, index: number, field: string): number | undefined {
  const text = event[field];
  if (typeof text !== 'string') return undefined;
  const value = parseDecimal(text);
  if (value === null) {
    throw new MalformedEventFieldError(index, field, `not a decimal: "${text}"`);
  }
  return value;
}

function optionalSide(event: JsonObject, field: string): MarketSide {
  const value = event[field];
  return typeof value === 'string' ? parseMarketSide(value) : 'unknown';
}

/**
 * Build one domain event
 *
 * Price is read before looking at the type, so even event kinds we skip
 * must carry one.
 */
function decodeEvent(raw: unknown, index: number): MarketEvent {
  if (!isObject(raw)) {
    throw new MalformedEventFieldError(index, 'price', 'event is not an object');
  }

  const price = requireDecimal(raw, index, 'price');
  const kind = parseMessageKind(requireString(raw, index, 'type'));

  switch (kind) {
    case 'change': {
      const quote: Quote = {
        price,
        reason: typeof raw.reason === 'string' ? raw.reason : '',
        remaining: optionalDecimal(raw, index, 'remaining') ?? 0,
        side: optionalSide(raw, 'side'),
      };
      const delta = optionalDecimal(raw, index, 'delta');
      if (delta !== undefined) {
        quote.delta = delta;
      }
      return { type: 'quote', quote };
    }
    case 'trade': {
      const trade: Trade = {
        price,
        amount: requireDecimal(raw, index, 'amount'),
        makerSide: optionalSide(raw, 'makerSide'),
      };
      return { type: 'trade', trade };
    }
    default:
      // Auctions, block trades, whatever Gemini adds next
      return { type: 'unknown' };
  }
}

/**
 * Decode one WebSocket frame
 *
 * Input (Gemini):
 *   { type: "update", eventId: 5375461993, socket_sequence: 7,
 *     timestamp: 1547760288, timestampms: 1547760288001,
 *     events: [{ type: "change", side: "bid", price: "3626.73",
 *                remaining: "1.6", delta: "0.8", reason: "place" }] }
 *
 * Output:
 *   { eventId: 5375461993, socketSequence: 7, timestamp: 1547760288,
 *     timestampms: 1547760288001,
 *     events: [{ type: "quote", quote: { price: 3626.73, remaining: 1.6,
 *                delta: 0.8, reason: "place", side: "bid" } }] }
 *
 * Throws MalformedMessageError / MalformedEventFieldError - one bad event
 * drops the whole frame. Callers filter out empty frames first.
 */
export function decodeMarketMessage(raw: Buffer | string): MarketMessage {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedMessageError(`Invalid JSON: ${reason}`);
  }

  if (!isObject(doc)) {
    throw new MalformedMessageError('Expected a JSON object');
  }

  if (!Array.isArray(doc.events)) {
    throw new MalformedMessageError('Missing events array', 'events');
  }

  const eventId = doc.eventId;
  if (!isUnsignedInteger(eventId)) {
    throw new MalformedMessageError('Missing or invalid eventId', 'eventId');
  }

  const socketSequence = doc.socket_sequence;
  if (!isUnsignedInteger(socketSequence) || socketSequence > MAX_U32) {
    throw new MalformedMessageError('Missing or invalid socket_sequence', 'socket_sequence');
  }

  const events = doc.events.map((event, index) => decodeEvent(event, index));

  const message: MarketMessage = { eventId, events, socketSequence };
  if (isUnsignedInteger(doc.timestamp)) {
    message.timestamp = doc.timestamp;
  }
  if (isUnsignedInteger(doc.timestampms)) {
    message.timestampms = doc.timestampms;
  }
  return message;
}
