export { AsyncQueue } from './asyncQueue.js';
export { EventEngine, type EventEngineOptions, type EventPublisher } from './eventEngine.js';
export { Event, EventKind, canHandle, createListener, eventKindSchema } from './events.js';

export type { EventHandler, EventListener, EventPayload } from './events.js';
