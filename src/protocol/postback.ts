/**
 * Path: src/protocol/postback.ts
 * Order update payload delivered on the control channel
 */

import { z } from "zod"

const optionalString = z.string().nullish()
const optionalNumber = z.number().nullish()

const PostbackSchema = z
    .object({
        order_id: z.string().min(1),
        status: z.string(),
        exchange_order_id: optionalString,
        parent_order_id: optionalString,
        placed_by: optionalString,
        user_id: optionalString,
        app_id: z.union([z.string(), z.number()]).nullish(),
        status_message: optionalString,
        tradingsymbol: optionalString,
        exchange: optionalString,
        instrument_token: optionalNumber,
        order_type: optionalString,
        transaction_type: optionalString,
        validity: optionalString,
        product: optionalString,
        variety: optionalString,
        quantity: optionalNumber,
        disclosed_quantity: optionalNumber,
        price: optionalNumber,
        trigger_price: optionalNumber,
        average_price: optionalNumber,
        filled_quantity: optionalNumber,
        pending_quantity: optionalNumber,
        unfilled_quantity: optionalNumber,
        cancelled_quantity: optionalNumber,
        market_protection: optionalNumber,
        order_timestamp: optionalString,
        exchange_timestamp: optionalString,
        exchange_update_timestamp: optionalString,
        tag: optionalString,
        guid: optionalString,
        checksum: optionalString,
    })
    .transform((raw) => ({
        orderId: raw.order_id,
        status: raw.status,
        exchangeOrderId: raw.exchange_order_id ?? undefined,
        parentOrderId: raw.parent_order_id ?? undefined,
        placedBy: raw.placed_by ?? undefined,
        userId: raw.user_id ?? undefined,
        appId: raw.app_id ?? undefined,
        statusMessage: raw.status_message ?? undefined,
        tradingSymbol: raw.tradingsymbol ?? undefined,
        exchange: raw.exchange ?? undefined,
        instrumentToken: raw.instrument_token ?? undefined,
        orderType: raw.order_type ?? undefined,
        transactionType: raw.transaction_type ?? undefined,
        validity: raw.validity ?? undefined,
        product: raw.product ?? undefined,
        variety: raw.variety ?? undefined,
        quantity: raw.quantity ?? undefined,
        disclosedQuantity: raw.disclosed_quantity ?? undefined,
        price: raw.price ?? undefined,
        triggerPrice: raw.trigger_price ?? undefined,
        averagePrice: raw.average_price ?? undefined,
        filledQuantity: raw.filled_quantity ?? undefined,
        pendingQuantity: raw.pending_quantity ?? undefined,
        unfilledQuantity: raw.unfilled_quantity ?? undefined,
        cancelledQuantity: raw.cancelled_quantity ?? undefined,
        marketProtection: raw.market_protection ?? undefined,
        orderTimestamp: raw.order_timestamp ?? undefined,
        exchangeTimestamp: raw.exchange_timestamp ?? undefined,
        exchangeUpdateTimestamp: raw.exchange_update_timestamp ?? undefined,
        tag: raw.tag ?? undefined,
        guid: raw.guid ?? undefined,
        checksum: raw.checksum ?? undefined,
    }))

export type Postback = z.output<typeof PostbackSchema>

export type PostbackParseResult =
    | { success: true; postback: Postback }
    | { success: false; reason: string }

export function parsePostback(data: unknown): PostbackParseResult {
    const result = PostbackSchema.safeParse(data)
    if (!result.success) {
        const reason = result.error.issues
            .map((issue) => `${issue.path.join(".") || "data"}: ${issue.message}`)
            .join("; ")
        return { success: false, reason }
    }
    return { success: true, postback: result.data }
}
