import { EventKind } from '../src/events/events.js';
import { ProtocolError } from '../src/protocol/errors.js';
import {
  checkResponse,
  classifyPush,
  decodeFrame,
  encodeFrame,
  looksLikeResponse,
  readFrameId
} from '../src/protocol/messages.js';

describe('decodeFrame', () => {
  it('parses a JSON object frame', () => {
    const result = decodeFrame('{"id":"3","status":"success"}');

    expect(result).toEqual({ ok: true, frame: { id: '3', status: 'success' } });
  });

  it('reports invalid JSON as a protocol error carrying the raw frame', () => {
    const result = decodeFrame('{not json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ProtocolError);
      expect(result.error.frame).toBe('{not json');
      expect(result.error.message).toMatch(/^Received invalid JSON: /);
    }
  });

  it('rejects JSON that is not an object', () => {
    for (const raw of ['[1,2]', '42', 'null', '"text"']) {
      const result = decodeFrame(raw);
      expect(result.ok).toBe(false);
    }
  });
});

describe('encodeFrame', () => {
  it('serializes the request with its id', () => {
    expect(JSON.parse(encodeFrame({ type: 'get_balances', exchange: 'binance', id: '9' }))).toEqual({
      type: 'get_balances',
      exchange: 'binance',
      id: '9'
    });
  });
});

describe('readFrameId', () => {
  it('normalizes numeric ids to strings', () => {
    expect(readFrameId({ id: 7 })).toBe('7');
    expect(readFrameId({ id: 'abc' })).toBe('abc');
    expect(readFrameId({ id: { nested: true } })).toBeUndefined();
    expect(readFrameId({})).toBeUndefined();
  });
});

describe('looksLikeResponse', () => {
  it('requires both an id and a status', () => {
    expect(looksLikeResponse({ id: '4', status: 'success' })).toBe(true);
    expect(looksLikeResponse({ id: '4', type: 'trade' })).toBe(false);
    expect(looksLikeResponse({ status: 'success' })).toBe(false);
  });

  it('leaves known push types to the push path even with an id and a status', () => {
    expect(looksLikeResponse({ type: 'order_update', id: 'ord-1', status: 'filled' })).toBe(false);
    expect(looksLikeResponse({ type: 'heartbeat', id: '4', status: 'success' })).toBe(true);
  });
});

describe('checkResponse', () => {
  it('accepts a success status', () => {
    const check = checkResponse({ id: '5', status: 'success', data: { last: '10' } });

    expect(check).toEqual({ ok: true, response: { id: '5', status: 'success', data: { last: '10' } } });
  });

  it('returns the peer message for a non-success status', () => {
    expect(checkResponse({ id: '6', status: 'error', message: 'Order not found' })).toEqual({
      ok: false,
      message: 'Order not found',
      requestId: '6'
    });
  });

  it('falls back to a generic message when the peer gives none', () => {
    expect(checkResponse({ id: '7', status: 'error' })).toEqual({ ok: false, message: 'Unknown error', requestId: '7' });
    expect(checkResponse({ id: '8' })).toEqual({ ok: false, message: 'Unknown error', requestId: '8' });
  });

  it('treats a non-string status as a failure', () => {
    expect(checkResponse({ id: '9', status: 200 })).toEqual({ ok: false, message: 'Unknown error', requestId: '9' });
  });

  it('accepts a success response whose message is null', () => {
    expect(checkResponse({ id: '10', status: 'success', message: null, data: { last: '1' } })).toEqual({
      ok: true,
      response: { id: '10', status: 'success', message: null, data: { last: '1' } }
    });
    expect(checkResponse({ status: 'success', message: null })).toEqual({
      ok: true,
      response: { status: 'success', message: null }
    });
  });

  it('falls back to a generic message when an error message is null', () => {
    expect(checkResponse({ id: '11', status: 'error', message: null })).toEqual({
      ok: false,
      message: 'Unknown error',
      requestId: '11'
    });
  });

  it('reports a success response with malformed fields', () => {
    expect(checkResponse({ id: '12', status: 'success', message: 42 })).toEqual({
      ok: false,
      message: 'Malformed response',
      requestId: '12'
    });
  });
});

describe('classifyPush', () => {
  it.each([
    ['order_update', EventKind.OrderUpdate],
    ['trade', EventKind.TradeUpdate],
    ['order_book_update', EventKind.MarketData],
    ['ticker_update', EventKind.MarketData],
    ['error', EventKind.Error],
    ['info', EventKind.Info]
  ])('maps %s to %s', (type, kind) => {
    expect(classifyPush({ type, data: { market: 'ETH-USDT' } })).toEqual({
      ok: true,
      kind,
      type,
      data: { market: 'ETH-USDT' }
    });
  });

  it('defaults missing data to an empty payload', () => {
    expect(classifyPush({ type: 'info' })).toEqual({ ok: true, kind: EventKind.Info, type: 'info', data: {} });
  });

  it('drops unknown types', () => {
    expect(classifyPush({ type: 'heartbeat', data: {} })).toEqual({ ok: false, reason: 'unknown_type', type: 'heartbeat' });
    expect(classifyPush({ type: 'constructor' })).toEqual({ ok: false, reason: 'unknown_type', type: 'constructor' });
  });

  it('reports frames without a type as malformed', () => {
    expect(classifyPush({ data: {} })).toEqual({ ok: false, reason: 'malformed' });
    expect(classifyPush({ type: 'trade', data: 'not an object' })).toEqual({ ok: false, reason: 'malformed' });
  });
});
