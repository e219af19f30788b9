/**
 * Path: src/websocket/types.ts
 * Transport options and lifecycle configuration
 */

export const NORMAL_CLOSURE = 1000

export interface WebSocketConnectOptions {
    connectTimeout: number // handshake timeout (ms)
}

export interface LifecycleConfig {
    connectTimeout: number // seconds
    enableReconnect: boolean
    initialReconnectDelay: number // seconds
    maxReconnectDelay: number // seconds
    maxReconnectTries: number
    pingInterval: number // ms, 0 disables pings
    pongTimeout: number // ms, 0 disables the pong check
}

export interface ReconnectState {
    tries: number
    delay: number // seconds
    isReconnecting: boolean
}
