import { z } from 'zod';

import type { OrderSide, OrderType, SubscriptionChannel } from '../domain/models.js';
import { EventKind } from '../events/events.js';

import { ProtocolError } from './errors.js';

export type WireFrame = Record<string, unknown>;

const wireIdSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * Example:
 * {
 *   "id": "7",
 *   "status": "success",
 *   "data": { "order_id": "ord_8f2c", "status": "open" }
 * }
 */
export const responseFrameSchema = z
  .object({
    id: wireIdSchema.optional(),
    status: z.string().optional(),
    message: z.string().nullish(),
    data: z.unknown().optional()
  })
  .passthrough();

/**
 * Example:
 * {
 *   "type": "trade",
 *   "data": { "market": "ETH-USDT", "price": "2450.25", "amount": "0.4" }
 * }
 */
export const pushFrameSchema = z
  .object({
    type: z.string().min(1),
    data: z.record(z.string(), z.unknown()).optional()
  })
  .passthrough();

export type WireResponse = z.infer<typeof responseFrameSchema>;
export type PushFrame = z.infer<typeof pushFrameSchema>;

export type AuthenticateRequest = {
  type: 'authenticate';
  api_key: string;
};

export type CreateOrderRequest = {
  type: 'create_order';
  exchange: string;
  market: string;
  side: OrderSide;
  order_type: OrderType;
  amount: string;
  price?: string;
};

export type OrderRequest = {
  type: 'cancel_order' | 'get_order';
  exchange: string;
  market: string;
  order_id: string;
};

export type OrderBookRequest = {
  type: 'get_order_book';
  exchange: string;
  market: string;
  depth: number;
};

export type MarketRequest = {
  type: 'get_ticker' | 'get_open_orders';
  exchange: string;
  market: string;
};

export type SubscribeRequest = {
  type: 'subscribe';
  channel: SubscriptionChannel;
  exchange: string;
  market: string;
};

export type BalancesRequest = {
  type: 'get_balances';
  exchange: string;
};

export type OrderHistoryRequest = {
  type: 'get_order_history';
  exchange: string;
  market: string;
  limit: number;
};

export type EngineRequest =
  | AuthenticateRequest
  | CreateOrderRequest
  | OrderRequest
  | OrderBookRequest
  | MarketRequest
  | SubscribeRequest
  | BalancesRequest
  | OrderHistoryRequest;

/** Any request shape plus an optional caller-chosen correlation id. */
export type OutboundMessage = EngineRequest & { id?: string };

export type DecodeResult = { ok: true; frame: WireFrame } | { ok: false; error: ProtocolError };

export type ResponseCheck =
  | { ok: true; response: WireResponse }
  | { ok: false; message: string; requestId?: string };

export const PUSH_EVENT_KINDS: ReadonlyMap<string, EventKind> = new Map<string, EventKind>([
  ['order_update', EventKind.OrderUpdate],
  ['trade', EventKind.TradeUpdate],
  ['order_book_update', EventKind.MarketData],
  ['ticker_update', EventKind.MarketData],
  ['error', EventKind.Error],
  ['info', EventKind.Info]
]);

export function encodeFrame(message: OutboundMessage): string {
  return JSON.stringify(message);
}

export function decodeFrame(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : 'unparseable';
    return { ok: false, error: new ProtocolError(`Received invalid JSON: ${reason}`, raw) };
  }

  if (!isWireFrame(parsed)) {
    return { ok: false, error: new ProtocolError('Received a frame that is not a JSON object', raw) };
  }

  return { ok: true, frame: parsed };
}

export function readFrameId(frame: WireFrame): string | undefined {
  const parsed = wireIdSchema.safeParse(frame.id);
  return parsed.success ? parsed.data : undefined;
}

/**
 * A frame carrying an id and a status is a response, whether or not anyone
 * still awaits it, unless its type names a known push.
 */
export function looksLikeResponse(frame: WireFrame): boolean {
  if (typeof frame.type === 'string' && PUSH_EVENT_KINDS.has(frame.type)) {
    return false;
  }

  return readFrameId(frame) !== undefined && typeof frame.status === 'string';
}

/** Success is decided on `status` alone; the other fields are checked only once it is `success`. */
export function checkResponse(frame: WireFrame): ResponseCheck {
  const requestId = readFrameId(frame);

  if (frame.status !== 'success') {
    const message = typeof frame.message === 'string' ? frame.message : 'Unknown error';
    return { ok: false, message, requestId };
  }

  const parsed = responseFrameSchema.safeParse(frame);
  if (!parsed.success) {
    return { ok: false, message: 'Malformed response', requestId };
  }

  return { ok: true, response: parsed.data };
}

export type PushClassification =
  | { ok: true; kind: EventKind; type: string; data: Record<string, unknown> }
  | { ok: false; reason: 'unknown_type'; type: string }
  | { ok: false; reason: 'malformed' };

export function classifyPush(frame: WireFrame): PushClassification {
  const parsed = pushFrameSchema.safeParse(frame);
  if (!parsed.success) {
    return { ok: false, reason: 'malformed' };
  }

  const kind = PUSH_EVENT_KINDS.get(parsed.data.type);
  if (kind === undefined) {
    return { ok: false, reason: 'unknown_type', type: parsed.data.type };
  }

  return { ok: true, kind, type: parsed.data.type, data: parsed.data.data ?? {} };
}

function isWireFrame(value: unknown): value is WireFrame {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
