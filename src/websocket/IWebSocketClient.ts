/**
 * Path: src/websocket/IWebSocketClient.ts
 * Transport boundary used by the connection lifecycle
 */

import { WebSocketConnectOptions } from "./types"

export interface WebSocketClientHandlers {
    onOpen(): void
    onMessage(data: Buffer, isBinary: boolean): void
    onPong(): void
    onClose(code: number, reason: string): void
    onError(error: Error): void
}

export interface IWebSocketClient {
    /**
     * Opens a new connection. Handlers are bound to that connection only; a
     * previous connection is detached and dropped.
     */
    connect(
        url: string,
        options: WebSocketConnectOptions,
        handlers: WebSocketClientHandlers
    ): void

    send(data: string): void

    ping(): void

    /** Closing handshake. */
    close(code?: number, reason?: string): void

    /** Drops the socket without a closing handshake. */
    terminate(): void

    isOpen(): boolean
}
