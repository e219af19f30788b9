/**
 * Path: src/websocket/WebSocketClient.ts
 * IWebSocketClient backed by the ws package
 */

import WebSocket from "ws"
import { IWebSocketClient, WebSocketClientHandlers } from "./IWebSocketClient"
import { WebSocketConnectOptions } from "./types"
import { WebSocketError, ErrorCode } from "../errors/types"
import { Logger } from "../utils/logger"

function toBuffer(data: WebSocket.RawData): Buffer {
    if (Buffer.isBuffer(data)) return data
    if (Array.isArray(data)) return Buffer.concat(data)
    return Buffer.from(data)
}

export class WebSocketClient implements IWebSocketClient {
    private ws: WebSocket | null = null
    private readonly logger = Logger.getInstance("WebSocketClient")

    connect(
        url: string,
        options: WebSocketConnectOptions,
        handlers: WebSocketClientHandlers
    ): void {
        this.detach()

        this.logger.debug("Opening websocket", {
            host: new URL(url).host,
        })
        const ws = new WebSocket(url, {
            handshakeTimeout: options.connectTimeout,
        })
        this.ws = ws

        ws.on("open", () => handlers.onOpen())
        ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
            handlers.onMessage(toBuffer(data), isBinary)
        })
        ws.on("pong", () => handlers.onPong())
        ws.on("error", (error: Error) => handlers.onError(error))
        ws.on("close", (code: number, reason: Buffer) => {
            if (this.ws === ws) this.ws = null
            handlers.onClose(code, reason.toString())
        })
    }

    send(data: string): void {
        if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
            throw new WebSocketError(
                ErrorCode.NOT_CONNECTED,
                "WebSocket is not connected or not ready"
            )
        }
        this.ws.send(data)
    }

    ping(): void {
        if (this.ws && this.ws.readyState === WebSocket.OPEN) {
            this.ws.ping()
        }
    }

    close(code?: number, reason?: string): void {
        if (!this.ws) return
        this.logger.debug("Closing websocket", { code })
        this.ws.close(code, reason)
    }

    terminate(): void {
        if (!this.ws) return
        this.logger.debug("Terminating websocket")
        this.ws.terminate()
    }

    isOpen(): boolean {
        return this.ws?.readyState === WebSocket.OPEN
    }

    // a replaced socket must not report into the new connection's handlers
    private detach(): void {
        const previous = this.ws
        if (!previous) return
        this.ws = null
        previous.removeAllListeners()
        // late errors from the dropped socket are only logged
        previous.on("error", (error: Error) => {
            this.logger.debug("Error on detached websocket", {
                error: error.message,
            })
        })
        previous.terminate()
    }
}
