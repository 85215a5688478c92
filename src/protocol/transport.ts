import pino, { type Logger } from 'pino';
import WebSocket from 'ws';

import { AsyncQueue } from '../events/asyncQueue.js';

/**
 * One persistent, ordered, bidirectional text-frame connection.
 * `next` resolves to `null` once the connection is closed and drained.
 */
export interface Transport {
  open(): Promise<void>;
  send(frame: string): Promise<void>;
  next(): Promise<string | null>;
  close(): Promise<void>;
}

export type TransportFactory = (url: string) => Transport;

export type WebSocketTransportOptions = {
  logger?: Logger;
  handshakeTimeoutMs?: number;
};

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5000;

export class WebSocketTransport implements Transport {
  private readonly url: string;
  private readonly logger: Logger;
  private readonly handshakeTimeoutMs: number;
  private readonly inbox = new AsyncQueue<string>();
  private socket: WebSocket | undefined;

  constructor(url: string, options: WebSocketTransportOptions = {}) {
    this.url = url;
    this.logger = options.logger ?? pino({ name: 'ws-transport' });
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
  }

  open(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('Transport already opened'));
    }

    const socket = new WebSocket(this.url, { handshakeTimeout: this.handshakeTimeoutMs });
    this.socket = socket;

    socket.on('message', (data) => {
      this.inbox.push(data.toString());
    });

    socket.on('close', (code, reason) => {
      this.logger.debug({ url: this.url, code, reason: reason.toString() }, 'WebSocket closed');
      this.inbox.close();
    });

    socket.on('error', (error) => {
      this.logger.warn({ url: this.url, errorMessage: error.message }, 'WebSocket error');
    });

    return new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        socket.off('error', onError);
        resolve();
      };

      const onError = (error: Error) => {
        socket.off('open', onOpen);
        reject(error);
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }

  send(frame: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('WebSocket is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      socket.send(frame, (error) => (error ? reject(error) : resolve()));
    });
  }

  async next(): Promise<string | null> {
    const frame = await this.inbox.take();
    return frame ?? null;
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      this.inbox.close();
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      socket.once('close', () => resolve());

      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
        return;
      }

      if (socket.readyState === WebSocket.OPEN) {
        socket.close();
      }
    });
  }
}

export const createWebSocketTransport =
  (options: WebSocketTransportOptions = {}): TransportFactory =>
  (url) =>
    new WebSocketTransport(url, options);
