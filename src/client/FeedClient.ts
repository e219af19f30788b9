/**
 * Path: src/client/FeedClient.ts
 * Market feed client: wires the transport lifecycle, tick decoder, control
 * channel and subscription registry together behind a callback API
 */

import { FeedClientOptions, FeedConfig } from "../config/types"
import { buildConnectUrl, resolveFeedConfig } from "../config/schema"
import { BinaryTickDecoder } from "../protocol/BinaryTickDecoder"
import {
    ControlChannelCodec,
    InboundControlMessage,
} from "../protocol/ControlChannelCodec"
import { Postback } from "../protocol/postback"
import {
    SubscriptionMode,
    SubscriptionRegistry,
} from "../subscriptions/SubscriptionRegistry"
import { Tick, TickMode } from "../types/tick"
import { FeedMetrics, createInitialMetrics } from "../types/metrics"
import { ConnectionState } from "../states/types"
import { ConnectionLifecycle } from "../websocket/ConnectionLifecycle"
import { IWebSocketClient } from "../websocket/IWebSocketClient"
import { WebSocketClient } from "../websocket/WebSocketClient"
import { ReconnectState } from "../websocket/types"
import { ErrorHandler } from "../errors/ErrorHandler"
import { Logger } from "../utils/logger"

// code reported with errors that do not come from a close frame
const NO_ERROR_CODE = 0

export class FeedClient {
    /** Called after every successful (re)connection, once subscriptions were replayed. */
    onConnect?: () => void
    onTicks?: (ticks: Tick[]) => void
    onOrderUpdate?: (postback: Postback) => void
    /** Receives the raw text of `message` envelopes. */
    onMessage?: (message: string) => void
    /**
     * Abnormal closes (with their close code) and error envelopes, malformed
     * frames and malformed control messages (with code 0).
     */
    onError?: (code: number, message: string) => void
    onConnectError?: () => void
    onTryReconnect?: (attemptCount: number) => void
    onReconnectFail?: () => void
    onClose?: (code: number, reason: string) => void

    private readonly config: FeedConfig
    private apiKey: string
    private accessToken: string
    private readonly lifecycle: ConnectionLifecycle
    private readonly decoder = new BinaryTickDecoder()
    private readonly codec = new ControlChannelCodec()
    private readonly subscriptions = new SubscriptionRegistry()
    private metrics: FeedMetrics = createInitialMetrics()
    private readonly logger = Logger.getInstance("FeedClient")
    private readonly errorHandler = new ErrorHandler(this.logger)

    constructor(
        options: FeedClientOptions,
        client: IWebSocketClient = new WebSocketClient()
    ) {
        this.config = resolveFeedConfig(options)
        this.apiKey = this.config.apiKey
        this.accessToken = this.config.accessToken

        this.lifecycle = new ConnectionLifecycle(
            client,
            this.config,
            () => buildConnectUrl(this.config.urlTemplate, this.apiKey, this.accessToken),
            {
                onConnected: () => this.handleConnected(),
                onMessage: (data, isBinary) => this.handleMessage(data, isBinary),
                onHeartbeat: () => this.updateMetrics({ heartbeats: this.metrics.heartbeats + 1 }),
                onConnectError: () => this.dispatch("onConnectError", () => this.onConnectError?.()),
                onError: (code, reason) => this.dispatch("onError", () => this.onError?.(code, reason)),
                onClose: (code, reason) => this.dispatch("onClose", () => this.onClose?.(code, reason)),
                onTryReconnect: (attempt) => {
                    this.updateMetrics({ reconnectAttempts: this.metrics.reconnectAttempts + 1 })
                    this.dispatch("onTryReconnect", () => this.onTryReconnect?.(attempt))
                },
                onReconnectFail: () => this.dispatch("onReconnectFail", () => this.onReconnectFail?.()),
            }
        )
    }

    setApiKey(apiKey: string): void {
        this.apiKey = apiKey
    }

    getApiKey(): string {
        return this.apiKey
    }

    /** Takes effect on the next connection attempt. */
    setAccessToken(accessToken: string): void {
        this.accessToken = accessToken
    }

    getAccessToken(): string {
        return this.accessToken
    }

    connect(): void {
        this.lifecycle.connect()
    }

    /** Closes the connection and cancels any pending reconnect. */
    stop(): void {
        this.lifecycle.stop()
    }

    isConnected(): boolean {
        return this.lifecycle.isConnected()
    }

    isReconnecting(): boolean {
        return this.lifecycle.isReconnecting()
    }

    getState(): ConnectionState {
        return this.lifecycle.getState()
    }

    getReconnectState(): Readonly<ReconnectState> {
        return this.lifecycle.getReconnectState()
    }

    /**
     * Time of the last heartbeat frame or pong. Use together with
     * `isConnected()` to spot a connection that went quiet.
     */
    getLastBeatTime(): Date | undefined {
        return this.lifecycle.getLastBeatTime()
    }

    getLastPongTime(): Date | undefined {
        return this.lifecycle.getLastPongTime()
    }

    getSubscriptions(): ReadonlyMap<number, SubscriptionMode> {
        return this.subscriptions.entries()
    }

    getMetrics(): FeedMetrics {
        return { ...this.metrics }
    }

    /**
     * @throws WebSocketError NOT_CONNECTED when there is no live connection
     */
    subscribe(tokens: number[]): void {
        this.lifecycle.send(this.codec.encodeSubscribe(tokens))
        this.subscriptions.add(tokens, "")
    }

    /**
     * @throws WebSocketError NOT_CONNECTED when there is no live connection
     */
    unsubscribe(tokens: number[]): void {
        this.lifecycle.send(this.codec.encodeUnsubscribe(tokens))
        this.subscriptions.remove(tokens)
    }

    /**
     * @throws WebSocketError NOT_CONNECTED when there is no live connection
     */
    setMode(mode: TickMode, tokens: number[]): void {
        this.lifecycle.send(this.codec.encodeMode(mode, tokens))
        this.subscriptions.add(tokens, mode)
    }

    private handleConnected(): void {
        this.updateMetrics({ connections: this.metrics.connections + 1 })

        try {
            const requests = this.subscriptions.resubscribe((mode, tokens) =>
                this.setMode(mode, tokens)
            )
            if (requests > 0) {
                this.logger.info("Resubscribed instruments", {
                    instruments: this.subscriptions.size,
                    requests,
                })
            }
        } catch (error) {
            const wsError = this.errorHandler.handleError(error)
            this.dispatch("onError", () => this.onError?.(NO_ERROR_CODE, wsError.message))
        }

        this.dispatch("onConnect", () => this.onConnect?.())
    }

    private handleMessage(data: Buffer, isBinary: boolean): void {
        if (isBinary) {
            this.handleBinaryFrame(data)
        } else {
            this.handleTextFrame(data.toString("utf8"))
        }
    }

    private handleBinaryFrame(frame: Buffer): void {
        this.updateMetrics({ framesReceived: this.metrics.framesReceived + 1 })
        const onTicks = this.onTicks
        if (!onTicks) return

        let ticks: Tick[]
        try {
            ticks = this.decoder.decode(frame)
        } catch (error) {
            const wsError = this.errorHandler.handleError(error)
            this.updateMetrics({ malformedFrames: this.metrics.malformedFrames + 1 })
            this.dispatch("onError", () => this.onError?.(NO_ERROR_CODE, wsError.message))
            return
        }

        if (ticks.length === 0) return
        this.updateMetrics({ ticksDecoded: this.metrics.ticksDecoded + ticks.length })
        this.dispatch("onTicks", () => onTicks(ticks))
    }

    private handleTextFrame(text: string): void {
        this.updateMetrics({ controlMessages: this.metrics.controlMessages + 1 })

        let message: InboundControlMessage
        try {
            message = this.codec.decode(text)
        } catch (error) {
            const wsError = this.errorHandler.handleError(error)
            this.updateMetrics({
                malformedControlMessages: this.metrics.malformedControlMessages + 1,
            })
            this.dispatch("onError", () => this.onError?.(NO_ERROR_CODE, wsError.message))
            return
        }

        switch (message.type) {
            case "order": {
                const { postback } = message
                this.dispatch("onOrderUpdate", () => this.onOrderUpdate?.(postback))
                break
            }
            case "message":
                this.dispatch("onMessage", () => this.onMessage?.(text))
                break
            case "error": {
                const { message: errorMessage } = message
                this.dispatch("onError", () => this.onError?.(NO_ERROR_CODE, errorMessage))
                break
            }
        }
    }

    // application callbacks run on the event context; a throwing callback must not break it
    private dispatch(name: string, invoke: () => void): void {
        try {
            invoke()
        } catch (error) {
            this.logger.error(`Callback ${name} threw`, error)
        }
    }

    private updateMetrics(update: Partial<FeedMetrics>): void {
        this.metrics = {
            ...this.metrics,
            ...update,
            lastUpdated: Date.now(),
        }
    }
}
