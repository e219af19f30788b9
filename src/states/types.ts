/**
 * Path: src/states/types.ts
 * Connection states and allowed transitions
 */

export enum ConnectionState {
    DISCONNECTED = "DISCONNECTED",
    CONNECTING = "CONNECTING",
    CONNECTED = "CONNECTED",
    RECONNECTING = "RECONNECTING",
    CLOSED = "CLOSED",
}

export const validStateTransitions: Record<ConnectionState, ConnectionState[]> = {
    [ConnectionState.DISCONNECTED]: [
        ConnectionState.CONNECTING,
        ConnectionState.RECONNECTING, // backoff wait before the next attempt
        ConnectionState.CLOSED, // stopped, or reconnect attempts exhausted
    ],
    [ConnectionState.CONNECTING]: [
        ConnectionState.CONNECTED,
        ConnectionState.DISCONNECTED, // handshake failed
        ConnectionState.CLOSED,
    ],
    [ConnectionState.CONNECTED]: [
        ConnectionState.DISCONNECTED,
        ConnectionState.CLOSED,
    ],
    [ConnectionState.RECONNECTING]: [
        ConnectionState.CONNECTING,
        ConnectionState.CLOSED, // stopped during backoff
    ],
    [ConnectionState.CLOSED]: [
        ConnectionState.CONNECTING, // explicit connect
    ],
}

export interface StateTransitionEvent {
    previousState: ConnectionState
    currentState: ConnectionState
    timestamp: number
}
