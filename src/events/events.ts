import { isDeepStrictEqual } from 'node:util';

import { z } from 'zod';

export const eventKindSchema = z.enum([
  'MarketData',
  'OrderUpdate',
  'TradeUpdate',
  'StrategyUpdate',
  'Error',
  'Info',
  'System'
]);

export const EventKind = eventKindSchema.enum;
export type EventKind = z.infer<typeof eventKindSchema>;

export type EventPayload = Record<string, unknown>;
export type EventHandler = (event: Event) => void | Promise<void>;

/**
 * Immutable record passed through the event engine. The payload is cloned
 * and frozen on construction, so a producer mutating its own object after
 * `put` never changes what listeners see.
 */
export class Event {
  readonly kind: EventKind;
  readonly payload: Readonly<EventPayload>;
  readonly createdAt: number;
  readonly origin?: string;

  constructor(kind: EventKind, payload: EventPayload, origin?: string) {
    this.kind = kind;
    this.payload = deepFreeze(structuredClone(payload));
    this.createdAt = Date.now();
    this.origin = origin;
    Object.freeze(this);
  }

  /** Kind and payload only; `createdAt` and `origin` are for observability. */
  equals(other: Event): boolean {
    return this.kind === other.kind && isDeepStrictEqual(this.payload, other.payload);
  }

  toString(): string {
    const origin = this.origin ? `, origin: ${this.origin}` : '';
    return `Event(kind: ${this.kind}, payload: ${JSON.stringify(this.payload)}, time: ${new Date(this.createdAt).toISOString()}${origin})`;
  }
}

export interface EventListener {
  readonly name: string;
  readonly acceptedKinds: ReadonlySet<EventKind>;
  handle(event: Event): void | Promise<void>;
}

export function canHandle(listener: EventListener, kind: EventKind): boolean {
  return listener.acceptedKinds.has(kind);
}

export function createListener(name: string, kinds: Iterable<EventKind>, handler: EventHandler): EventListener {
  return {
    name,
    acceptedKinds: new Set(kinds),
    handle: handler
  };
}

function deepFreeze<T>(value: T): T {
  // typed arrays cannot be frozen
  if (value !== null && typeof value === 'object' && !ArrayBuffer.isView(value) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }

  return value;
}
