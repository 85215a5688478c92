export { ProtocolClient, type ProtocolClientOptions } from './client.js';
export type { BalancesData, MarketQuery, OrderBookQuery, OrderData, OrderHistoryQuery } from './client.js';
export {
  ConnectionError,
  EngineLinkError,
  ProtocolError,
  RemoteError,
  RequestTimeoutError,
  ValidationError
} from './errors.js';
export {
  PUSH_EVENT_KINDS,
  checkResponse,
  classifyPush,
  decodeFrame,
  encodeFrame,
  pushFrameSchema,
  responseFrameSchema
} from './messages.js';
export type { EngineRequest, OutboundMessage, PushClassification, ResponseCheck, WireFrame, WireResponse } from './messages.js';
export { PendingRequestTable } from './pendingRequests.js';
export { WebSocketTransport, createWebSocketTransport } from './transport.js';
export type { Transport, TransportFactory, WebSocketTransportOptions } from './transport.js';
