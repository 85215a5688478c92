import { z } from 'zod';

export const orderTypeSchema = z.enum(['limit', 'market']);
export const orderSideSchema = z.enum(['buy', 'sell']);
export const orderStatusSchema = z.enum(['open', 'partially_filled', 'filled', 'cancelled', 'failed']);
export const marketTypeSchema = z.enum(['spot', 'futures']);
export const subscriptionChannelSchema = z.enum(['order_book', 'trades']);

/**
 * Lifecycle of the single connection owned by a protocol client:
 * disconnected -> connecting -> connected -> disconnected, with
 * connecting/connected -> error on failure.
 */
export const connectionStatusSchema = z.enum(['disconnected', 'connecting', 'connected', 'error']);

export const OrderType = orderTypeSchema.enum;
export const OrderSide = orderSideSchema.enum;
export const OrderStatus = orderStatusSchema.enum;
export const MarketType = marketTypeSchema.enum;
export const ConnectionStatus = connectionStatusSchema.enum;

export type OrderType = z.infer<typeof orderTypeSchema>;
export type OrderSide = z.infer<typeof orderSideSchema>;
export type OrderStatus = z.infer<typeof orderStatusSchema>;
export type MarketType = z.infer<typeof marketTypeSchema>;
export type SubscriptionChannel = z.infer<typeof subscriptionChannelSchema>;
export type ConnectionStatus = z.infer<typeof connectionStatusSchema>;

const nonEmptyString = z.string().min(1);
const positiveNumber = z.number().finite().positive();

/**
 * Example:
 * {
 *   "exchange": "binance",
 *   "market": "ETH-USDT",
 *   "side": "buy",
 *   "orderType": "limit",
 *   "amount": 1.5,
 *   "price": 2450.25
 * }
 */
export const createOrderInputSchema = z
  .object({
    exchange: nonEmptyString,
    market: nonEmptyString,
    side: orderSideSchema,
    orderType: orderTypeSchema,
    amount: positiveNumber,
    price: positiveNumber.optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.orderType === 'limit' && value.price === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Price is required for limit orders',
        path: ['price']
      });
    }
  });

/**
 * Example:
 * {
 *   "exchange": "binance",
 *   "market": "ETH-USDT",
 *   "orderId": "ord_8f2c"
 * }
 */
export const orderRefSchema = z
  .object({
    exchange: nonEmptyString,
    market: nonEmptyString,
    orderId: nonEmptyString
  })
  .strict();

export type CreateOrderInput = z.infer<typeof createOrderInputSchema>;
export type OrderRef = z.infer<typeof orderRefSchema>;
