/**
 * Path: src/errors/types.ts
 * Error codes and error type raised by the feed client
 */

export enum ErrorCode {
    // transport
    CONNECTION_FAILED = "CONNECTION_FAILED",
    CONNECTION_CLOSED = "CONNECTION_CLOSED",
    CONNECTION_TIMEOUT = "CONNECTION_TIMEOUT",
    NOT_CONNECTED = "NOT_CONNECTED",
    SEND_FAILED = "SEND_FAILED",

    // inbound data
    MESSAGE_PARSE_ERROR = "MESSAGE_PARSE_ERROR",
    UNKNOWN_MESSAGE_TYPE = "UNKNOWN_MESSAGE_TYPE",
    MALFORMED_FRAME = "MALFORMED_FRAME",

    // lifecycle
    RECONNECT_EXHAUSTED = "RECONNECT_EXHAUSTED",
    INVALID_STATE = "INVALID_STATE",

    INVALID_CONFIG = "INVALID_CONFIG",
    INTERNAL_ERROR = "INTERNAL_ERROR",
}

export enum ErrorSeverity {
    LOW = "LOW",
    MEDIUM = "MEDIUM",
    HIGH = "HIGH",
    CRITICAL = "CRITICAL",
}

export class WebSocketError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly originalError?: Error,
        public readonly severity: ErrorSeverity = ErrorSeverity.MEDIUM
    ) {
        super(message)
        this.name = "WebSocketError"
    }

    toString(): string {
        return `${this.name}[${this.code}]: ${this.message}`
    }
}
