import Bottleneck from 'bottleneck';
import pRetry, { AbortError } from 'p-retry';
import type { Logger } from 'pino';
import pino from 'pino';
import { z } from 'zod';

import {
  createOrderInputSchema,
  orderRefSchema,
  type ConnectionStatus,
  type CreateOrderInput,
  type OrderRef,
  type SubscriptionChannel
} from '../domain/models.js';
import type { EventPublisher } from '../events/eventEngine.js';
import { Event, EventKind, type EventPayload } from '../events/events.js';

import { ConnectionError, RemoteError, RequestTimeoutError, ValidationError, errorMessage } from './errors.js';
import {
  checkResponse,
  classifyPush,
  decodeFrame,
  encodeFrame,
  looksLikeResponse,
  readFrameId,
  type OutboundMessage,
  type WireFrame,
  type WireResponse
} from './messages.js';
import { PendingRequestTable } from './pendingRequests.js';
import { createWebSocketTransport, type Transport, type TransportFactory } from './transport.js';

export type ProtocolClientOptions = {
  eventEngine: EventPublisher;
  host: string;
  port: number;
  apiKey: string;
  path?: string;
  requestTimeoutMs?: number;
  retryAttempts?: number;
  rateLimitRps?: number;
  logger?: Logger;
  transportFactory?: TransportFactory;
};

export type OrderBookQuery = { exchange: string; market: string; depth?: number };
export type MarketQuery = { exchange: string; market: string };
export type OrderHistoryQuery = { exchange: string; market: string; limit?: number };

export type OrderData = Record<string, unknown>;
export type BalancesData = Record<string, unknown>;

const DEFAULT_PATH = '/ws';
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_COUNT = 3;
const DEFAULT_RATE_LIMIT_RPS = 50;
const DEFAULT_ORDER_BOOK_DEPTH = 10;
const DEFAULT_HISTORY_LIMIT = 50;

const PUSH_ORIGIN = 'engine';
const CLIENT_ORIGIN = 'client';

const connectionOptionsSchema = z.object({
  host: z.string().min(1, 'API host cannot be empty'),
  port: z.number().int().min(1).max(65535, 'API port must be a valid port number (1-65535)'),
  apiKey: z.string().min(1, 'API key cannot be empty'),
  path: z.string().startsWith('/', 'Path must start with "/"'),
  requestTimeoutMs: z.number().finite().positive('Request timeout must be positive'),
  retryAttempts: z.number().int().nonnegative('Retry attempts cannot be negative'),
  rateLimitRps: z.number().finite().positive('Rate limit must be positive')
});

const objectDataSchema = z.record(z.string(), z.unknown());
const listDataSchema = z.array(objectDataSchema);

export class ProtocolClient {
  readonly host: string;
  readonly port: number;
  readonly path: string;
  readonly requestTimeoutMs: number;
  readonly retryAttempts: number;

  private readonly apiKey: string;
  private readonly eventEngine: EventPublisher;
  private readonly logger: Logger;
  private readonly limiter: Bottleneck;
  private readonly transportFactory: TransportFactory;
  private readonly pending = new PendingRequestTable();

  private status: ConnectionStatus = 'disconnected';
  private transport: Transport | undefined;
  private connecting: Promise<void> | undefined;
  private connectAbort: AbortController | undefined;
  private receiveLoop: Promise<void> | undefined;
  private receiveAbort: AbortController | undefined;
  // Never reset, so ids stay unique across reconnects.
  private messageId = 0;

  constructor(options: ProtocolClientOptions) {
    const parsed = connectionOptionsSchema.safeParse({
      host: options.host,
      port: options.port,
      apiKey: options.apiKey,
      path: options.path ?? DEFAULT_PATH,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      retryAttempts: options.retryAttempts ?? DEFAULT_RETRY_COUNT,
      rateLimitRps: options.rateLimitRps ?? DEFAULT_RATE_LIMIT_RPS
    });

    if (!parsed.success) {
      throw new ValidationError(
        `Invalid client options: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        parsed.error.issues
      );
    }

    this.host = parsed.data.host;
    this.port = parsed.data.port;
    this.path = parsed.data.path;
    this.apiKey = parsed.data.apiKey;
    this.requestTimeoutMs = parsed.data.requestTimeoutMs;
    this.retryAttempts = parsed.data.retryAttempts;

    this.eventEngine = options.eventEngine;
    this.logger = options.logger ?? pino({ name: 'protocol-client' });
    this.transportFactory = options.transportFactory ?? createWebSocketTransport({ logger: this.logger });

    const minTimeMs = Math.ceil(1000 / parsed.data.rateLimitRps);
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
  }

  get url(): string {
    return `ws://${this.host}:${this.port}${this.path}`;
  }

  getStatus(): ConnectionStatus {
    return this.status;
  }

  isConnected(): boolean {
    return this.status === 'connected';
  }

  isReceiving(): boolean {
    return this.receiveLoop !== undefined;
  }

  getPendingRequestCount(): number {
    return this.pending.size;
  }

  async connect(): Promise<void> {
    if (this.status === 'connected') {
      this.logger.info({ url: this.url }, 'Already connected to trading engine');
      return;
    }

    if (this.connecting) {
      return this.connecting;
    }

    this.connecting = this.establish().finally(() => {
      this.connecting = undefined;
    });

    return this.connecting;
  }

  async disconnect(): Promise<void> {
    this.logger.info({ url: this.url }, 'Disconnecting from trading engine');

    this.connectAbort?.abort();
    this.receiveAbort?.abort();
    this.receiveAbort = undefined;

    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      await this.closeTransport(transport);
    }

    // An attempt still in flight sees the abort and unwinds; its caller gets the error.
    const attempt = this.connecting;
    if (attempt) {
      await Promise.allSettled([attempt]);
    }

    const loop = this.receiveLoop;
    if (loop) {
      await loop;
      this.receiveLoop = undefined;
    }

    this.pending.rejectAll(new ConnectionError('Connection closed'));
    this.status = 'disconnected';
    this.logger.info({ url: this.url }, 'Disconnected from trading engine');
  }

  /**
   * Sends one request and waits for the frame carrying the same id. Assigns
   * the next id unless the message already has one.
   */
  async request(message: OutboundMessage, timeoutMs = this.requestTimeoutMs): Promise<WireFrame> {
    const transport = this.transport;
    if (!transport || this.status !== 'connected') {
      throw new ConnectionError('Not connected to trading engine');
    }

    const id = message.id ?? this.nextRequestId();
    if (this.pending.has(id)) {
      throw new ValidationError(`Request id ${id} is already awaiting a response`);
    }

    const frame = encodeFrame({ ...message, id });

    const response = this.pending.register(id, timeoutMs);
    const sent = this.limiter
      .schedule(() => transport.send(frame))
      .catch((error: unknown) => {
        this.pending.reject(id, new ConnectionError(`Failed to send request ${id}: ${errorMessage(error)}`, { cause: error }));
      });

    const [reply] = await Promise.all([response, sent]);
    return reply;
  }

  async createOrder(input: CreateOrderInput): Promise<OrderData> {
    const order = this.validate(createOrderInputSchema, input, 'order');

    try {
      const response = await this.exchange(
        {
          type: 'create_order',
          exchange: order.exchange,
          market: order.market,
          side: order.side,
          order_type: order.orderType,
          amount: String(order.amount),
          ...(order.orderType === 'limit' && order.price !== undefined ? { price: String(order.price) } : {})
        },
        'create order'
      );

      const data = this.readData(response, objectDataSchema, {}, 'create_order');
      this.publish(EventKind.OrderUpdate, data, PUSH_ORIGIN);
      return data;
    } catch (error: unknown) {
      this.publish(
        EventKind.Error,
        {
          message: `Failed to create ${order.orderType} ${order.side} order for ${order.market} on ${order.exchange}`,
          exchange: order.exchange,
          market: order.market
        },
        CLIENT_ORIGIN
      );
      throw error;
    }
  }

  async cancelOrder(input: OrderRef): Promise<OrderData> {
    const ref = this.validate(orderRefSchema, input, 'order reference');

    try {
      const response = await this.exchange(
        { type: 'cancel_order', exchange: ref.exchange, market: ref.market, order_id: ref.orderId },
        'cancel order'
      );

      const data = this.readData(response, objectDataSchema, {}, 'cancel_order');
      this.publish(
        EventKind.OrderUpdate,
        { order_id: ref.orderId, status: 'cancelled', exchange: ref.exchange, market: ref.market },
        PUSH_ORIGIN
      );
      return data;
    } catch (error: unknown) {
      this.publish(
        EventKind.Error,
        {
          message: `Failed to cancel order ${ref.orderId} for ${ref.market} on ${ref.exchange}`,
          exchange: ref.exchange,
          market: ref.market,
          order_id: ref.orderId
        },
        CLIENT_ORIGIN
      );
      throw error;
    }
  }

  async getOrder(input: OrderRef): Promise<OrderData> {
    const ref = this.validate(orderRefSchema, input, 'order reference');
    const response = await this.exchange(
      { type: 'get_order', exchange: ref.exchange, market: ref.market, order_id: ref.orderId },
      'get order status'
    );

    return this.readData(response, objectDataSchema, {}, 'get_order');
  }

  async getOrderBook(query: OrderBookQuery): Promise<Record<string, unknown>> {
    const response = await this.exchange(
      {
        type: 'get_order_book',
        exchange: query.exchange,
        market: query.market,
        depth: query.depth ?? DEFAULT_ORDER_BOOK_DEPTH
      },
      'get order book'
    );

    return this.readData(response, objectDataSchema, {}, 'get_order_book');
  }

  async getTicker(query: MarketQuery): Promise<Record<string, unknown>> {
    const response = await this.exchange({ type: 'get_ticker', exchange: query.exchange, market: query.market }, 'get ticker');
    return this.readData(response, objectDataSchema, {}, 'get_ticker');
  }

  async subscribeToOrderBook(query: MarketQuery): Promise<WireResponse> {
    return this.subscribe('order_book', query);
  }

  async subscribeToTrades(query: MarketQuery): Promise<WireResponse> {
    return this.subscribe('trades', query);
  }

  async getBalances(exchange: string): Promise<BalancesData> {
    const response = await this.exchange({ type: 'get_balances', exchange }, 'get balances');
    return this.readData(response, objectDataSchema, {}, 'get_balances');
  }

  async getOpenOrders(query: MarketQuery): Promise<OrderData[]> {
    const response = await this.exchange(
      { type: 'get_open_orders', exchange: query.exchange, market: query.market },
      'get open orders'
    );

    return this.readData(response, listDataSchema, [], 'get_open_orders');
  }

  async getOrderHistory(query: OrderHistoryQuery): Promise<OrderData[]> {
    const response = await this.exchange(
      {
        type: 'get_order_history',
        exchange: query.exchange,
        market: query.market,
        limit: query.limit ?? DEFAULT_HISTORY_LIMIT
      },
      'get order history'
    );

    return this.readData(response, listDataSchema, [], 'get_order_history');
  }

  private async subscribe(channel: SubscriptionChannel, query: MarketQuery): Promise<WireResponse> {
    const label = channel === 'order_book' ? 'subscribe to order book' : 'subscribe to trades';
    return this.exchange({ type: 'subscribe', channel, exchange: query.exchange, market: query.market }, label);
  }

  private async exchange(message: OutboundMessage, action: string): Promise<WireResponse> {
    const response = await this.request(message);
    const check = checkResponse(response);

    if (!check.ok) {
      throw new RemoteError(`Failed to ${action}: ${check.message}`, check.message, check.requestId);
    }

    return check.response;
  }

  private readData<T>(response: WireResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T, type: string): T {
    if (response.data === undefined || response.data === null) {
      return fallback;
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new RemoteError(`Unexpected data in ${type} response`, parsed.error.message, response.id);
    }

    return parsed.data;
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid ${label}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        parsed.error.issues
      );
    }

    return parsed.data;
  }

  private async establish(): Promise<void> {
    const url = this.url;
    const attempt = new AbortController();
    this.connectAbort = attempt;
    this.logger.info({ url }, 'Connecting to trading engine');
    this.status = 'connecting';

    try {
      const transport = await this.openTransport(url, attempt.signal);
      this.transport = transport;
      throwIfCancelled(attempt.signal);

      await this.authenticate(transport);
      throwIfCancelled(attempt.signal);

      this.status = 'connected';
      this.startReceiveLoop(transport);
      this.logger.info({ url }, 'Connected to trading engine');
    } catch (error: unknown) {
      this.status = 'error';
      await this.cleanup(new ConnectionError('Connection attempt failed'));
      this.status = 'disconnected';

      if (attempt.signal.aborted) {
        this.logger.info({ url }, 'Connection attempt cancelled');
        throw new ConnectionError('Connection attempt cancelled', { cause: error });
      }

      const failure =
        error instanceof ConnectionError
          ? error
          : new ConnectionError(`Failed to connect to trading engine: ${errorMessage(error)}`, { cause: error });

      this.logger.error({ url, errorMessage: failure.message }, 'Trading engine connection failed');
      this.publish(EventKind.Error, { message: failure.message, url }, CLIENT_ORIGIN);
      throw failure;
    } finally {
      if (this.connectAbort === attempt) {
        this.connectAbort = undefined;
      }
    }
  }

  private async openTransport(url: string, signal: AbortSignal): Promise<Transport> {
    return pRetry(
      async () => {
        if (signal.aborted) {
          throw new AbortError('Connection attempt cancelled');
        }

        const transport = this.transportFactory(url);
        try {
          await transport.open();
        } catch (error: unknown) {
          await this.closeTransport(transport);
          throw error instanceof Error ? error : new Error(String(error));
        }

        if (signal.aborted) {
          await this.closeTransport(transport);
          throw new AbortError('Connection attempt cancelled');
        }

        return transport;
      },
      {
        retries: this.retryAttempts,
        factor: 2,
        minTimeout: 100,
        maxTimeout: 2000,
        onFailedAttempt: (error) => {
          this.logger.warn(
            {
              url,
              attemptNumber: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              errorMessage: error.message
            },
            'Trading engine connection attempt failed'
          );
        }
      }
    );
  }

  /** The acknowledgment is read straight off the transport; nothing else is accepted before it. */
  private async authenticate(transport: Transport): Promise<void> {
    const id = this.nextRequestId();
    await transport.send(encodeFrame({ type: 'authenticate', api_key: this.apiKey, id }));

    const raw = await withDeadline(transport.next(), this.requestTimeoutMs, () => new RequestTimeoutError(id, this.requestTimeoutMs));
    if (raw === null) {
      throw new ConnectionError('Connection closed during authentication');
    }

    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      throw new ConnectionError(`Invalid authentication response: ${decoded.error.message}`);
    }

    const check = checkResponse(decoded.frame);
    if (!check.ok) {
      throw new ConnectionError(`Authentication failed: ${check.message}`);
    }
  }

  private startReceiveLoop(transport: Transport): void {
    const controller = new AbortController();
    this.receiveAbort = controller;
    this.receiveLoop = this.processFrames(transport, controller.signal);
  }

  private async processFrames(transport: Transport, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let raw: string | null;
      try {
        raw = await transport.next();
      } catch (error: unknown) {
        this.logger.error({ errorMessage: errorMessage(error) }, 'Transport read failed');
        raw = null;
      }

      if (signal.aborted) {
        this.logger.info('Receive loop cancelled');
        return;
      }

      if (raw === null) {
        await this.handleTransportLoss(transport);
        return;
      }

      try {
        this.handleFrame(raw);
      } catch (error: unknown) {
        this.logger.error({ errorMessage: errorMessage(error) }, 'Error processing inbound frame');
      }
    }
  }

  private handleFrame(raw: string): void {
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      this.logger.error({ frame: decoded.error.frame, errorMessage: decoded.error.message }, 'Skipping malformed frame');
      return;
    }

    const frame = decoded.frame;
    const id = readFrameId(frame);

    if (id !== undefined && this.pending.resolve(id, frame)) {
      return;
    }

    if (looksLikeResponse(frame)) {
      this.logger.warn({ requestId: id, status: frame.status }, 'Dropping response with no pending request');
      return;
    }

    this.handlePush(frame, raw);
  }

  private handlePush(frame: WireFrame, raw: string): void {
    const push = classifyPush(frame);

    if (push.ok) {
      this.publish(push.kind, push.data, PUSH_ORIGIN);
      return;
    }

    if (push.reason === 'unknown_type') {
      this.logger.warn({ type: push.type }, 'Received unknown event type');
      return;
    }

    this.logger.error({ frame: raw }, 'Skipping unclassifiable frame');
  }

  private async handleTransportLoss(transport: Transport): Promise<void> {
    this.logger.error({ url: this.url }, 'Connection to trading engine lost, stopping receive loop');
    this.status = 'error';
    this.receiveLoop = undefined;

    if (this.transport === transport) {
      this.transport = undefined;
    }

    this.pending.rejectAll(new ConnectionError('Connection lost'));
    await this.closeTransport(transport);
    this.publish(EventKind.Error, { message: 'Connection to trading engine lost', url: this.url }, CLIENT_ORIGIN);
  }

  private async cleanup(reason: ConnectionError): Promise<void> {
    this.receiveAbort?.abort();
    this.receiveAbort = undefined;

    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      await this.closeTransport(transport);
    }

    this.pending.rejectAll(reason);
  }

  private async closeTransport(transport: Transport): Promise<void> {
    try {
      await transport.close();
    } catch (error: unknown) {
      this.logger.error({ errorMessage: errorMessage(error) }, 'Error closing transport');
    }
  }

  private publish(kind: EventKind, payload: EventPayload, origin: string): void {
    this.eventEngine.put(new Event(kind, payload, origin));
  }

  /** Skips counter values a caller already used as an explicit id. */
  private nextRequestId(): string {
    do {
      this.messageId += 1;
    } while (this.pending.has(String(this.messageId)));

    return String(this.messageId);
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new ConnectionError('Connection attempt cancelled');
  }
}

function withDeadline<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}
