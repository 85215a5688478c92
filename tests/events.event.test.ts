import { Event, EventKind, canHandle, createListener, eventKindSchema } from '../src/events/events.js';

describe('Event', () => {
  it('copies the payload so later producer mutation is not observed', () => {
    const payload = { market: 'ETH-USDT', levels: { bid: 10, ask: 11 } };
    const event = new Event(EventKind.MarketData, payload, 'feed');

    payload.market = 'BTC-USDT';
    payload.levels.bid = 99;

    expect(event.payload).toEqual({ market: 'ETH-USDT', levels: { bid: 10, ask: 11 } });
  });

  it('freezes the event and its nested payload', () => {
    const event = new Event(EventKind.OrderUpdate, { order: { id: 'ord-1' } });

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(Object.isFrozen(event.payload.order)).toBe(true);
  });

  it('compares by kind and payload only', () => {
    const first = new Event(EventKind.TradeUpdate, { price: '1.5' }, 'engine');
    const second = new Event(EventKind.TradeUpdate, { price: '1.5' }, 'client');

    expect(first.equals(second)).toBe(true);
    expect(first.equals(new Event(EventKind.TradeUpdate, { price: '1.6' }))).toBe(false);
    expect(first.equals(new Event(EventKind.MarketData, { price: '1.5' }))).toBe(false);
  });

  it('renders kind, payload and origin', () => {
    const event = new Event(EventKind.Info, { message: 'hello' }, 'engine');

    expect(event.toString()).toContain('kind: Info');
    expect(event.toString()).toContain('payload: {"message":"hello"}');
    expect(event.toString()).toContain(', origin: engine)');
  });

  it('exposes the closed set of kinds', () => {
    expect(eventKindSchema.options).toEqual([
      'MarketData',
      'OrderUpdate',
      'TradeUpdate',
      'StrategyUpdate',
      'Error',
      'Info',
      'System'
    ]);
    expect(eventKindSchema.safeParse('Heartbeat').success).toBe(false);
  });
});

describe('createListener', () => {
  it('accepts only the declared kinds', () => {
    const listener = createListener('risk', [EventKind.OrderUpdate, EventKind.TradeUpdate], () => undefined);

    expect(listener.name).toBe('risk');
    expect(canHandle(listener, EventKind.OrderUpdate)).toBe(true);
    expect(canHandle(listener, EventKind.TradeUpdate)).toBe(true);
    expect(canHandle(listener, EventKind.MarketData)).toBe(false);
  });
});
