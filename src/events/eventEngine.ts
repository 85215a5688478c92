import pino, { type Logger } from 'pino';

import { AsyncQueue } from './asyncQueue.js';
import { canHandle, createListener, type Event, type EventHandler, type EventKind, type EventListener } from './events.js';

export type EventEngineOptions = {
  logger?: Logger;
  pollIntervalMs?: number;
  stopGraceMs?: number;
};

export type EventPublisher = {
  put(event: Event): void;
};

const DEFAULT_POLL_INTERVAL_MS = 100;
const DEFAULT_STOP_GRACE_MS = 1000;

export class EventEngine implements EventPublisher {
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly stopGraceMs: number;
  private readonly queue = new AsyncQueue<Event>();
  // Replaced, never mutated: a dispatch keeps the array it started with.
  private listeners: readonly EventListener[] = [];
  private running = false;
  private loop: Promise<void> | undefined;
  private loopActive = false;

  constructor(options: EventEngineOptions = {}) {
    this.logger = options.logger ?? pino({ name: 'event-engine' });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
  }

  register(listener: EventListener): void {
    this.listeners = [...this.listeners, listener];
  }

  unregister(listener: EventListener): void {
    if (!this.listeners.includes(listener)) {
      return;
    }

    this.listeners = this.listeners.filter((item) => item !== listener);
  }

  on(kinds: Iterable<EventKind>, handler: EventHandler, name = 'anonymous'): () => void {
    const listener = createListener(name, kinds, handler);
    this.register(listener);

    return () => {
      this.unregister(listener);
    };
  }

  getListeners(): EventListener[] {
    return [...this.listeners];
  }

  put(event: Event): void {
    this.queue.push(event);
  }

  getPendingCount(): number {
    return this.queue.size;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;

    // A loop left over from a stop that outlived its grace period picks the flag back up.
    if (this.loopActive) {
      return;
    }

    this.loop = this.processEvents();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.queue.wake();

    const loop = this.loop;
    if (!loop) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.stopGraceMs);
    });

    const finished = await Promise.race([loop.then(() => true), grace]);
    clearTimeout(timer);

    if (!finished) {
      this.logger.warn({ graceMs: this.stopGraceMs }, 'Event loop did not stop within grace period');
    }
  }

  private async processEvents(): Promise<void> {
    this.loopActive = true;

    try {
      while (this.running) {
        const event = await this.queue.take(this.pollIntervalMs);
        if (!event) {
          continue;
        }

        await this.distribute(event);
      }
    } finally {
      this.loopActive = false;
    }
  }

  private async distribute(event: Event): Promise<void> {
    const listeners = this.listeners;

    for (const listener of listeners) {
      if (!canHandle(listener, event.kind)) {
        continue;
      }

      try {
        await listener.handle(event);
      } catch (error: unknown) {
        this.logger.error(
          {
            listener: listener.name,
            kind: event.kind,
            errorName: error instanceof Error ? error.name : 'UnknownError',
            errorMessage: error instanceof Error ? error.message : String(error)
          },
          'Event listener failed'
        );
      }
    }
  }
}
