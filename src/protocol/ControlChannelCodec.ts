/**
 * Path: src/protocol/ControlChannelCodec.ts
 * JSON control messages: outbound subscribe / unsubscribe / mode requests and
 * inbound order / message / error envelopes
 */

import { WebSocketError, ErrorCode, ErrorSeverity } from "../errors/types"
import { TickMode } from "../types/tick"
import { Postback, parsePostback } from "./postback"

export type ControlRequest =
    | { a: "subscribe"; v: number[] }
    | { a: "unsubscribe"; v: number[] }
    | { a: "mode"; v: [TickMode, number[]] }

export type InboundControlMessage =
    | { type: "order"; postback: Postback }
    | { type: "message"; raw: string }
    | { type: "error"; message: string }

const INBOUND_TYPES = ["order", "message", "error"] as const
type InboundType = (typeof INBOUND_TYPES)[number]

function isInboundType(value: string): value is InboundType {
    return INBOUND_TYPES.some((type) => type === value)
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class ControlChannelCodec {
    encodeSubscribe(tokens: readonly number[]): string {
        return this.encode({ a: "subscribe", v: [...tokens] })
    }

    encodeUnsubscribe(tokens: readonly number[]): string {
        return this.encode({ a: "unsubscribe", v: [...tokens] })
    }

    encodeMode(mode: TickMode, tokens: readonly number[]): string {
        return this.encode({ a: "mode", v: [mode, [...tokens]] })
    }

    encode(request: ControlRequest): string {
        return JSON.stringify(request)
    }

    /**
     * Parses one inbound text frame.
     * @throws WebSocketError MESSAGE_PARSE_ERROR or UNKNOWN_MESSAGE_TYPE
     */
    decode(text: string): InboundControlMessage {
        let parsed: unknown
        try {
            parsed = JSON.parse(text)
        } catch (error) {
            throw new WebSocketError(
                ErrorCode.MESSAGE_PARSE_ERROR,
                "Control message is not valid JSON",
                error instanceof Error ? error : undefined,
                ErrorSeverity.LOW
            )
        }

        if (!isRecord(parsed)) {
            throw new WebSocketError(
                ErrorCode.MESSAGE_PARSE_ERROR,
                "Expected a JSON object",
                undefined,
                ErrorSeverity.LOW
            )
        }

        const type = typeof parsed.type === "string" ? parsed.type : ""
        if (!isInboundType(type)) {
            throw new WebSocketError(
                ErrorCode.UNKNOWN_MESSAGE_TYPE,
                `Cannot recognize websocket message type "${type}"`,
                undefined,
                ErrorSeverity.LOW
            )
        }

        switch (type) {
            case "order": {
                const result = parsePostback(parsed.data)
                if (!result.success) {
                    throw new WebSocketError(
                        ErrorCode.MESSAGE_PARSE_ERROR,
                        `Invalid order update: ${result.reason}`,
                        undefined,
                        ErrorSeverity.LOW
                    )
                }
                return { type, postback: result.postback }
            }
            case "message":
                return { type, raw: text }
            case "error":
                return {
                    type,
                    message:
                        typeof parsed.data === "string"
                            ? parsed.data
                            : JSON.stringify(parsed.data ?? null),
                }
        }
    }
}
