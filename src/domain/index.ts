export {
  ConnectionStatus,
  MarketType,
  OrderSide,
  OrderStatus,
  OrderType,
  connectionStatusSchema,
  createOrderInputSchema,
  marketTypeSchema,
  orderRefSchema,
  orderSideSchema,
  orderStatusSchema,
  orderTypeSchema,
  subscriptionChannelSchema
} from './models.js';

export type { CreateOrderInput, OrderRef, SubscriptionChannel } from './models.js';
