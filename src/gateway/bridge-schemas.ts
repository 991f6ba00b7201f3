// Wire shapes of the terminal bridge and their mapping onto copier entities

import { z } from 'zod';
import { ORDER_TYPES, OrderSubmission, ParamChanges, TaggedOrder, TaggedPosition } from '../shared/types';

const ticket = z.union([z.number().int(), z.string().min(1)]).transform(String);

// Terminals report an unset stop/target as 0
const optionalPrice = z.number().nullable().optional().transform(value => (value ? value : null));

export const bridgeOrderSchema = z.object({
  ticket,
  symbol: z.string().min(1),
  type: z.enum(ORDER_TYPES),
  volume: z.number().positive(),
  price_open: z.number(),
  sl: optionalPrice,
  tp: optionalPrice,
  expiration: z.string().datetime({ offset: true }).nullable().optional(),
  magic: z.number().int().nonnegative().default(0),
});

export const bridgePositionSchema = z.object({
  ticket,
  symbol: z.string().min(1),
  type: z.enum(['BUY', 'SELL']),
  volume: z.number().positive(),
  price_open: z.number(),
  sl: optionalPrice,
  tp: optionalPrice,
  magic: z.number().int().nonnegative().default(0),
});

export const bridgeSymbolSchema = z.object({
  name: z.string(),
  digits: z.number().int().nonnegative(),
  volume_min: z.number().nonnegative(),
  volume_max: z.number().positive(),
  volume_step: z.number().positive(),
  trade_allowed: z.boolean(),
});

export const bridgeTicketSchema = z.object({ ticket });

export type BridgeOrder = z.infer<typeof bridgeOrderSchema>;
export type BridgePosition = z.infer<typeof bridgePositionSchema>;
export type BridgeSymbol = z.infer<typeof bridgeSymbolSchema>;

/** magic 0 is the terminal default for manually placed entities */
function magicToTag(magic: number): string | null {
  return magic === 0 ? null : String(magic);
}

export function toOrderEntity(order: BridgeOrder): TaggedOrder {
  return {
    kind: 'ORDER',
    id: order.ticket,
    instrument: order.symbol,
    side: order.type.startsWith('BUY') ? 'BUY' : 'SELL',
    size: order.volume,
    orderType: order.type,
    entryPrice: order.price_open,
    stopLoss: order.sl,
    takeProfit: order.tp,
    expiry: order.expiration ?? null,
    tag: magicToTag(order.magic),
  };
}

export function toPositionEntity(position: BridgePosition): TaggedPosition {
  return {
    kind: 'POSITION',
    id: position.ticket,
    instrument: position.symbol,
    side: position.type,
    size: position.volume,
    entryPrice: position.price_open,
    stopLoss: position.sl,
    takeProfit: position.tp,
    tag: magicToTag(position.magic),
  };
}

/**
 * Tags travel in the terminal's numeric magic field, so only numeric
 * source ids can be written.
 */
export function tagToMagic(tag: string): number | null {
  return /^[1-9]\d*$/.test(tag) && Number.isSafeInteger(Number(tag)) ? Number(tag) : null;
}

export function toBridgeSubmission(submission: OrderSubmission, magic: number): Record<string, unknown> {
  return {
    symbol: submission.instrument,
    type: submission.orderType,
    volume: submission.size,
    price: submission.entryPrice,
    sl: submission.stopLoss ?? 0,
    tp: submission.takeProfit ?? 0,
    expiration: submission.expiry,
    magic,
    comment: submission.comment,
  };
}

/** Only the fields present in `changes` are sent; a cleared stop or target goes out as 0 */
export function toBridgeChanges(changes: ParamChanges): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (changes.entryPrice !== undefined) body.price = changes.entryPrice;
  if (changes.stopLoss !== undefined) body.sl = changes.stopLoss ?? 0;
  if (changes.takeProfit !== undefined) body.tp = changes.takeProfit ?? 0;
  if (changes.expiry !== undefined) body.expiration = changes.expiry;
  return body;
}
