/**
 * Path: tests/mock/MockWebSocketClient.ts
 * 네트워크 없이 연결 수명주기를 구동하는 IWebSocketClient 목
 * - 서버 이벤트(open, message, pong, error, close)는 테스트에서 직접 발생시킴
 */

import {
    IWebSocketClient,
    WebSocketClientHandlers,
} from "../../src/websocket/IWebSocketClient"
import { WebSocketConnectOptions } from "../../src/websocket/types"
import { WebSocketError, ErrorCode } from "../../src/errors/types"

export interface ConnectCall {
    url: string
    options: WebSocketConnectOptions
}

export class MockWebSocketClient implements IWebSocketClient {
    readonly connectCalls: ConnectCall[] = []
    readonly sent: string[] = []
    readonly closeCalls: Array<{ code?: number; reason?: string }> = []
    pingCount = 0
    terminateCount = 0
    failNextSend = false

    private handlers?: WebSocketClientHandlers
    private open = false

    connect(
        url: string,
        options: WebSocketConnectOptions,
        handlers: WebSocketClientHandlers
    ): void {
        this.connectCalls.push({ url, options })
        this.handlers = handlers
        this.open = false
    }

    send(data: string): void {
        if (!this.open) {
            throw new WebSocketError(
                ErrorCode.NOT_CONNECTED,
                "WebSocket is not connected or not ready"
            )
        }
        if (this.failNextSend) {
            this.failNextSend = false
            throw new Error("socket write failed")
        }
        this.sent.push(data)
    }

    ping(): void {
        this.pingCount++
    }

    close(code?: number, reason?: string): void {
        this.closeCalls.push({ code, reason })
        this.open = false
    }

    terminate(): void {
        this.terminateCount++
        this.open = false
    }

    isOpen(): boolean {
        return this.open
    }

    // 서버 측 이벤트 시뮬레이션

    serverOpen(): void {
        this.open = true
        this.requireHandlers().onOpen()
    }

    receive(data: Buffer | string, isBinary = Buffer.isBuffer(data)): void {
        const payload = typeof data === "string" ? Buffer.from(data, "utf8") : data
        this.requireHandlers().onMessage(payload, isBinary)
    }

    receiveJson(value: unknown): void {
        this.receive(JSON.stringify(value), false)
    }

    serverPong(): void {
        this.requireHandlers().onPong()
    }

    fail(error: Error = new Error("connect ECONNREFUSED")): void {
        this.open = false
        this.requireHandlers().onError(error)
    }

    serverClose(code: number, reason = ""): void {
        this.open = false
        this.requireHandlers().onClose(code, reason)
    }

    sentJson(): unknown[] {
        return this.sent.map((message) => JSON.parse(message))
    }

    clearSent(): void {
        this.sent.length = 0
    }

    private requireHandlers(): WebSocketClientHandlers {
        if (!this.handlers) {
            throw new Error("connect() was not called")
        }
        return this.handlers
    }
}
