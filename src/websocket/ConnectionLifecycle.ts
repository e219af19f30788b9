/**
 * Path: src/websocket/ConnectionLifecycle.ts
 * Owns the transport connection: state transitions, exponential-backoff
 * reconnection, ping / pong supervision and heartbeat tracking
 */

import { IWebSocketClient } from "./IWebSocketClient"
import {
    LifecycleConfig,
    NORMAL_CLOSURE,
    ReconnectState,
} from "./types"
import {
    ConnectionState,
    StateTransitionEvent,
    validStateTransitions,
} from "../states/types"
import { WebSocketError, ErrorCode, ErrorSeverity } from "../errors/types"
import { ErrorHandler } from "../errors/ErrorHandler"
import { Logger } from "../utils/logger"

export interface LifecycleHooks {
    onConnected(): void
    onMessage(data: Buffer, isBinary: boolean): void
    onHeartbeat(): void
    onConnectError(error: WebSocketError): void
    onError(code: number, reason: string): void
    onClose(code: number, reason: string): void
    onTryReconnect(attempt: number): void
    onReconnectFail(): void
    onStateChange?(event: StateTransitionEvent): void
}

export class ConnectionLifecycle {
    private state = ConnectionState.DISCONNECTED
    private readonly reconnectState: ReconnectState
    private reconnectTimer?: NodeJS.Timeout
    private pingTimer?: NodeJS.Timeout
    private lastBeatTime?: Date
    private lastPongTime?: Date
    private readonly logger = Logger.getInstance("ConnectionLifecycle")
    private readonly errorHandler = new ErrorHandler(this.logger)

    constructor(
        private readonly client: IWebSocketClient,
        private readonly config: LifecycleConfig,
        private readonly resolveUrl: () => string,
        private readonly hooks: LifecycleHooks
    ) {
        this.reconnectState = {
            tries: 0,
            delay: config.initialReconnectDelay,
            isReconnecting: false,
        }
    }

    connect(): void {
        if (
            this.state === ConnectionState.CONNECTING ||
            this.state === ConnectionState.CONNECTED ||
            this.state === ConnectionState.RECONNECTING
        ) {
            this.logger.debug("Connect ignored", { state: this.state })
            return
        }

        if (this.state === ConnectionState.CLOSED) {
            this.resetReconnectState()
        }
        this.openTransport()
    }

    /**
     * Cancels a pending reconnect, stops pinging and closes the transport
     * with a normal closure.
     */
    stop(): void {
        this.clearReconnectTimer()
        this.stopPing()
        this.reconnectState.isReconnecting = false

        const wasOpen =
            this.state === ConnectionState.CONNECTED ||
            this.state === ConnectionState.CONNECTING
        this.updateState(ConnectionState.CLOSED)

        if (wasOpen) {
            this.client.close(NORMAL_CLOSURE, "client stopped")
        }
    }

    send(data: string): void {
        if (this.state !== ConnectionState.CONNECTED) {
            throw new WebSocketError(
                ErrorCode.NOT_CONNECTED,
                "Not connected to websocket server",
                undefined,
                ErrorSeverity.LOW
            )
        }

        try {
            this.client.send(data)
        } catch (error) {
            throw this.errorHandler.normalizeError(error, ErrorCode.SEND_FAILED)
        }
    }

    isConnected(): boolean {
        return this.state === ConnectionState.CONNECTED
    }

    isReconnecting(): boolean {
        return this.reconnectState.isReconnecting
    }

    getState(): ConnectionState {
        return this.state
    }

    getReconnectState(): Readonly<ReconnectState> {
        return { ...this.reconnectState }
    }

    getLastBeatTime(): Date | undefined {
        return this.lastBeatTime
    }

    getLastPongTime(): Date | undefined {
        return this.lastPongTime
    }

    private openTransport(): void {
        this.updateState(ConnectionState.CONNECTING)

        try {
            this.client.connect(
                this.resolveUrl(),
                { connectTimeout: this.config.connectTimeout * 1000 },
                {
                    onOpen: () => this.handleOpen(),
                    onMessage: (data, isBinary) =>
                        this.handleMessage(data, isBinary),
                    onPong: () => this.handlePong(),
                    onClose: (code, reason) => this.handleClose(code, reason),
                    onError: (error) => this.handleTransportError(error),
                }
            )
        } catch (error) {
            this.handleTransportError(error)
        }
    }

    private handleOpen(): void {
        if (this.state === ConnectionState.CLOSED) {
            // stopped while the handshake was in flight
            this.client.close(NORMAL_CLOSURE, "client stopped")
            return
        }
        if (this.state !== ConnectionState.CONNECTING) {
            this.logger.warn("Open event outside a handshake, dropping socket", {
                state: this.state,
            })
            this.client.terminate()
            return
        }

        this.resetReconnectState()
        this.lastPongTime = new Date()
        this.updateState(ConnectionState.CONNECTED)
        this.startPing()
        this.logger.info("Connected")
        this.hooks.onConnected()
    }

    private handleMessage(data: Buffer, isBinary: boolean): void {
        if (isBinary && data.length === 1) {
            this.lastBeatTime = new Date()
            this.hooks.onHeartbeat()
            return
        }
        this.hooks.onMessage(data, isBinary)
    }

    private handlePong(): void {
        const now = new Date()
        this.lastPongTime = now
        this.lastBeatTime = now
    }

    private handleTransportError(error: unknown): void {
        const wsError = this.errorHandler.handleError(
            this.errorHandler.normalizeError(error, ErrorCode.CONNECTION_FAILED)
        )

        if (this.state === ConnectionState.CLOSED) {
            return
        }

        this.hooks.onConnectError(wsError)

        if (this.state === ConnectionState.CONNECTED) {
            // drop the non-responsive connection
            this.client.terminate()
        }
        this.stopPing()
        if (
            this.state === ConnectionState.CONNECTING ||
            this.state === ConnectionState.CONNECTED
        ) {
            this.updateState(ConnectionState.DISCONNECTED)
        }

        if (this.config.enableReconnect) {
            this.reconnect()
        }
    }

    private handleClose(code: number, reason: string): void {
        this.stopPing()
        const stopped = this.state === ConnectionState.CLOSED
        if (
            this.state === ConnectionState.CONNECTING ||
            this.state === ConnectionState.CONNECTED
        ) {
            this.updateState(ConnectionState.DISCONNECTED)
        }

        if (stopped) {
            this.logger.info("Connection closed after stop", { code, reason })
        } else if (code !== NORMAL_CLOSURE) {
            this.errorHandler.handleError(
                new WebSocketError(
                    ErrorCode.CONNECTION_CLOSED,
                    `Connection closed with code ${code}${reason ? `: ${reason}` : ""}`
                )
            )
            this.hooks.onError(code, reason)
        } else {
            this.logger.info("Connection closed", { code, reason })
        }
        this.hooks.onClose(code, reason)

        if (code !== NORMAL_CLOSURE && this.config.enableReconnect && !stopped) {
            this.reconnect()
        }
    }

    /**
     * One step of the backoff campaign: either schedules the next attempt
     * after the current delay or gives up once the attempt budget is spent.
     */
    private reconnect(): void {
        if (
            this.reconnectTimer ||
            this.state === ConnectionState.CONNECTED ||
            this.state === ConnectionState.CONNECTING ||
            this.state === ConnectionState.CLOSED
        ) {
            return
        }

        const state = this.reconnectState
        state.isReconnecting = true
        state.tries++

        if (state.tries > this.config.maxReconnectTries) {
            this.errorHandler.handleError(
                new WebSocketError(
                    ErrorCode.RECONNECT_EXHAUSTED,
                    `Gave up after ${this.config.maxReconnectTries} reconnect attempts`,
                    undefined,
                    ErrorSeverity.HIGH
                )
            )
            state.isReconnecting = false
            this.updateState(ConnectionState.CLOSED)
            // last, so a connect() made from the callback starts a fresh campaign
            this.hooks.onReconnectFail()
            return
        }

        const delay = state.delay
        this.updateState(ConnectionState.RECONNECTING)
        this.logger.info("Reconnecting", { attempt: state.tries, delay })

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = undefined
            state.delay = Math.min(state.delay * 2, this.config.maxReconnectDelay)
            this.hooks.onTryReconnect(state.tries)
            this.openTransport()
        }, delay * 1000)
    }

    private resetReconnectState(): void {
        this.reconnectState.tries = 0
        this.reconnectState.delay = this.config.initialReconnectDelay
        this.reconnectState.isReconnecting = false
    }

    private startPing(): void {
        this.stopPing()
        if (this.config.pingInterval <= 0) return

        this.pingTimer = setInterval(() => {
            if (this.isPongOverdue()) {
                this.errorHandler.handleError(
                    new WebSocketError(
                        ErrorCode.CONNECTION_TIMEOUT,
                        `No pong for ${this.config.pongTimeout}ms, dropping connection`
                    )
                )
                this.stopPing()
                this.client.terminate()
                return
            }
            this.client.ping()
        }, this.config.pingInterval)
    }

    private isPongOverdue(): boolean {
        if (this.config.pongTimeout <= 0 || !this.lastPongTime) return false
        return Date.now() - this.lastPongTime.getTime() > this.config.pongTimeout
    }

    private stopPing(): void {
        if (this.pingTimer) {
            clearInterval(this.pingTimer)
            this.pingTimer = undefined
        }
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer)
            this.reconnectTimer = undefined
        }
    }

    private updateState(newState: ConnectionState): void {
        if (this.state === newState) return

        if (!validStateTransitions[this.state].includes(newState)) {
            throw new WebSocketError(
                ErrorCode.INVALID_STATE,
                `Invalid state transition from ${this.state} to ${newState}`,
                undefined,
                ErrorSeverity.HIGH
            )
        }

        const event: StateTransitionEvent = {
            previousState: this.state,
            currentState: newState,
            timestamp: Date.now(),
        }
        this.state = newState
        this.logger.debug("State change", { ...event })
        this.hooks.onStateChange?.(event)
    }
}
